/**
 * WeCom 群机器人配置 Schema (Zod)
 */

import { z } from "zod";

import { LIMITS, WEBHOOK_BASE_URL } from "../types/constants.js";

/**
 * **WecomBotConfigSchema (客户端配置)**
 *
 * @property key - Webhook key，不能为空
 * @property timeoutMs - 请求超时时间 (毫秒) [默认: 10000]
 * @property proxyUrl - 出站 HTTP 代理 (如 "http://127.0.0.1:7890")
 * @property baseUrl - Webhook 基础地址，末尾的 "/" 会被去掉
 */
export const WecomBotConfigSchema = z.object({
    key: z
        .string({ required_error: "wecom bot key not set" })
        .trim()
        .min(1, "wecom bot key not set"),
    timeoutMs: z
        .union([z.string(), z.number()])
        .transform((value) => Number(value))
        .refine((value) => Number.isInteger(value) && value > 0, {
            message: "timeoutMs must be a positive integer",
        })
        .refine((value) => !(value > LIMITS.MAX_TIMEOUT_MS), {
            message: `timeoutMs must not exceed ${LIMITS.MAX_TIMEOUT_MS}`,
        })
        .default(LIMITS.REQUEST_TIMEOUT_MS),
    proxyUrl: z.string().trim().url().optional(),
    baseUrl: z
        .string()
        .trim()
        .url()
        .transform((url) => url.replace(/\/+$/, ""))
        .default(WEBHOOK_BASE_URL),
});

export type WecomBotConfigInput = z.input<typeof WecomBotConfigSchema>;
export type WecomBotConfig = z.output<typeof WecomBotConfigSchema>;
