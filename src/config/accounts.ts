/**
 * WeCom 群机器人配置解析
 */

import { WecomBotError } from "../errors.js";
import { WecomBotConfigSchema, type WecomBotConfig, type WecomBotConfigInput } from "./schema.js";
import { resolveWecomEgressProxyUrlFromNetwork } from "./network.js";

/**
 * **resolveWecomBotConfig (解析客户端配置)**
 *
 * 校验调用方传入的选项；配置无效时抛出 `config` 错误。
 * 显式传入的 `proxyUrl` 优先；未传时回退到环境变量 `WECOM_EGRESS_PROXY_URL`。
 */
export function resolveWecomBotConfig(
    input: WecomBotConfigInput,
    env: NodeJS.ProcessEnv = process.env,
): WecomBotConfig {
    const parsed = WecomBotConfigSchema.safeParse({
        ...input,
        proxyUrl: resolveWecomEgressProxyUrlFromNetwork({ egressProxyUrl: input.proxyUrl }, env),
    });

    if (!parsed.success) {
        const formatted = parsed.error.issues.map((issue) => issue.message).join("; ");
        throw new WecomBotError("config", `Invalid wecom bot configuration: ${formatted}`, { cause: parsed.error });
    }

    return parsed.data;
}

/**
 * **loadWecomBotConfig (从环境变量加载配置)**
 *
 * - `WECOM_BOT_KEY` (必填)
 * - `WECOM_BOT_TIMEOUT_MS`
 * - `WECOM_BOT_BASE_URL`
 * - `WECOM_EGRESS_PROXY_URL`
 */
export function loadWecomBotConfig(env: NodeJS.ProcessEnv = process.env): WecomBotConfig {
    return resolveWecomBotConfig(
        {
            key: env.WECOM_BOT_KEY ?? "",
            timeoutMs: env.WECOM_BOT_TIMEOUT_MS?.trim() || undefined,
            baseUrl: env.WECOM_BOT_BASE_URL?.trim() || undefined,
        },
        env,
    );
}
