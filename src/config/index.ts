/**
 * WeCom 配置模块导出
 */

export { WecomBotConfigSchema, type WecomBotConfig, type WecomBotConfigInput } from "./schema.js";
export { loadWecomBotConfig, resolveWecomBotConfig } from "./accounts.js";
export { resolveWecomEgressProxyUrlFromNetwork } from "./network.js";
