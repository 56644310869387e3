import { z } from "zod";

import { WecomBotError } from "./errors.js";

const sendResponseSchema = z.object({
    errcode: z.number().int(),
    errmsg: z.string().default(""),
});

const uploadResponseSchema = sendResponseSchema.extend({
    type: z.string().default(""),
    media_id: z.string().default(""),
    // 企业微信返回的 created_at 可能是字符串也可能是数字
    created_at: z.union([z.string(), z.number()]).transform(String).default(""),
});

/** 发送消息响应，errcode 为 0 表示成功 */
export type WecomSendResponse = z.output<typeof sendResponseSchema>;

/** 上传媒体响应，media_id 仅在 errcode 为 0 时有效 */
export type WecomUploadResponse = z.output<typeof uploadResponseSchema>;

function decodeWith<T extends z.ZodTypeAny>(schema: T, json: unknown, label: string): z.output<T> {
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        const formatted = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new WecomBotError("decode", `could not parse ${label} from JSON: ${formatted}`, { cause: parsed.error });
    }
    return parsed.data;
}

export function decodeSendResponse(json: unknown): WecomSendResponse {
    return decodeWith(sendResponseSchema, json, "send response");
}

export function decodeUploadResponse(json: unknown): WecomUploadResponse {
    return decodeWith(uploadResponseSchema, json, "upload response");
}

export function isWecomOk(resp: { errcode: number }): boolean {
    return resp.errcode === 0;
}

/**
 * **ensureWecomOk (校验 errcode)**
 *
 * 企业微信接口层面的失败默认作为数据返回；需要抛错语义时由调用方显式调用。
 */
export function ensureWecomOk<T extends { errcode: number; errmsg: string }>(resp: T): T {
    if (resp.errcode !== 0) {
        throw new WecomBotError("api", `wecom api error: ${resp.errcode} ${resp.errmsg}`, { errcode: resp.errcode });
    }
    return resp;
}
