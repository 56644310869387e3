/**
 * WeCom 群机器人消息构造与校验
 *
 * 所有消息在发送前都会经过本地校验 (长度、文章数、图片格式等)，
 * 不满足企业微信限制时直接抛出 `validation` 错误，不发起网络请求。
 */

import crypto from "node:crypto";
import { z } from "zod";

import { WecomBotError } from "./errors.js";
import { detectImageFormat, encodeWecomImage, readImageFile } from "./image.js";
import { LIMITS } from "./types/constants.js";
import type {
    WecomBotMessage,
    WecomFileMessage,
    WecomImageMessage,
    WecomMarkdownMessage,
    WecomMentionOptions,
    WecomNewsArticle,
    WecomNewsMessage,
    WecomTextMessage,
    WecomVoiceMessage,
} from "./types/index.js";

function utf8Bytes(value: string): number {
    return Buffer.byteLength(value, "utf8");
}

function withinBytes(schema: z.ZodString, limit: number, label: string) {
    return schema.refine((value) => utf8Bytes(value) <= limit, { message: `${label} exceeds ${limit} bytes` });
}

// 空的 @ 列表不序列化
const mentionListSchema = z
    .array(z.string())
    .optional()
    .transform((list) => (list && list.length > 0 ? list : undefined));

const textSchema = z.object({
    msgtype: z.literal("text"),
    text: z.object({
        content: withinBytes(z.string().min(1, "text content is empty"), LIMITS.TEXT_MAX_BYTES, "text content"),
        mentioned_list: mentionListSchema,
        mentioned_mobile_list: mentionListSchema,
    }),
});

const markdownSchema = z.object({
    msgtype: z.literal("markdown"),
    markdown: z.object({
        content: withinBytes(z.string().min(1, "markdown content is empty"), LIMITS.MARKDOWN_MAX_BYTES, "markdown content"),
    }),
});

const imageSchema = z.object({
    msgtype: z.literal("image"),
    image: z
        .object({
            base64: z.string().min(1, "image base64 is empty"),
            md5: z.string().regex(/^[a-f0-9]{32}$/, "image md5 must be 32 lower-case hex chars"),
        })
        .superRefine((image, ctx) => {
            const raw = Buffer.from(image.base64, "base64");
            if (raw.length > LIMITS.IMAGE_MAX_BYTES) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `image exceeds ${LIMITS.IMAGE_MAX_BYTES} bytes` });
            }
            if (!detectImageFormat(raw)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: "image must be PNG or JPEG" });
            }
            const md5 = crypto.createHash("md5").update(raw).digest("hex");
            if (md5 !== image.md5) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: "image md5 does not match content" });
            }
        }),
});

const articleSchema = z.object({
    title: withinBytes(z.string().min(1, "article title is empty"), LIMITS.NEWS_TITLE_MAX_BYTES, "article title"),
    description: withinBytes(z.string(), LIMITS.NEWS_DESCRIPTION_MAX_BYTES, "article description").optional(),
    url: z.string().min(1, "article url is empty"),
    picurl: z.string().optional(),
});

const newsSchema = z.object({
    msgtype: z.literal("news"),
    news: z.object({
        articles: z
            .array(articleSchema)
            .min(1, "news message requires at least 1 article")
            .max(LIMITS.NEWS_MAX_ARTICLES, `news message allows at most ${LIMITS.NEWS_MAX_ARTICLES} articles`),
    }),
});

const mediaIdSchema = z.object({ media_id: z.string().min(1, "media_id is empty") });

const fileSchema = z.object({ msgtype: z.literal("file"), file: mediaIdSchema });
const voiceSchema = z.object({ msgtype: z.literal("voice"), voice: mediaIdSchema });

export const WecomBotMessageSchema = z.discriminatedUnion("msgtype", [
    textSchema,
    markdownSchema,
    imageSchema,
    newsSchema,
    fileSchema,
    voiceSchema,
]);

/**
 * **validateWecomBotMessage (校验消息)**
 *
 * 返回规范化后的消息：丢弃未知字段和空的 @ 列表。
 */
export function validateWecomBotMessage(message: WecomBotMessage): WecomBotMessage {
    const parsed = WecomBotMessageSchema.safeParse(message);
    if (!parsed.success) {
        const formatted = parsed.error.issues
            .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
            .join("; ");
        throw new WecomBotError("validation", `invalid wecom bot message: ${formatted}`, { cause: parsed.error });
    }
    return parsed.data;
}

/**
 * **serializeWecomBotMessage (序列化消息)**
 *
 * 输出 `{"msgtype": <type>, <type>: {...}}`，仅包含当前消息类型相关字段。
 */
export function serializeWecomBotMessage(message: WecomBotMessage): string {
    return JSON.stringify(validateWecomBotMessage(message));
}

export function buildTextMessage(content: string, mentions?: WecomMentionOptions): WecomTextMessage {
    return withMentions({ msgtype: "text", text: { content } }, mentions ?? {});
}

/**
 * **withMentions (追加 @ 成员)**
 *
 * 返回新的文本消息，原消息不变。追加到已有列表之后，保持顺序。
 */
export function withMentions(message: WecomTextMessage, mentions: WecomMentionOptions): WecomTextMessage {
    const mentionedList = [...(message.text.mentioned_list ?? []), ...(mentions.mentionedList ?? [])];
    const mentionedMobileList = [...(message.text.mentioned_mobile_list ?? []), ...(mentions.mentionedMobileList ?? [])];
    return {
        msgtype: "text",
        text: {
            content: message.text.content,
            ...(mentionedList.length ? { mentioned_list: mentionedList } : {}),
            ...(mentionedMobileList.length ? { mentioned_mobile_list: mentionedMobileList } : {}),
        },
    };
}

export function buildMarkdownMessage(content: string): WecomMarkdownMessage {
    return { msgtype: "markdown", markdown: { content } };
}

export function buildImageMessage(data: Uint8Array): WecomImageMessage {
    return { msgtype: "image", image: encodeWecomImage(data) };
}

/** 从本地文件构造图片消息，读取失败抛出 `io` 错误 */
export async function loadImageMessage(path: string): Promise<WecomImageMessage> {
    return buildImageMessage(await readImageFile(path));
}

export function buildNewsMessage(articles: WecomNewsArticle[]): WecomNewsMessage {
    return { msgtype: "news", news: { articles: articles.map((article) => ({ ...article })) } };
}

export function buildFileMessage(mediaId: string): WecomFileMessage {
    return { msgtype: "file", file: { media_id: mediaId } };
}

export function buildVoiceMessage(mediaId: string): WecomVoiceMessage {
    return { msgtype: "voice", voice: { media_id: mediaId } };
}
