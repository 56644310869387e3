/**
 * WeCom 类型统一导出
 */

// 常量
export * from "./constants.js";

// 配置类型
export type {
    WecomRuntimeEnv,
    WecomNetworkConfig,
    WecomBotOptions,
} from "./config.js";

// 消息类型
export type {
    WecomTextMessage,
    WecomMarkdownMessage,
    WecomImageMessage,
    WecomNewsArticle,
    WecomNewsMessage,
    WecomFileMessage,
    WecomVoiceMessage,
    WecomBotMessage,
    WecomBotMessageType,
    WecomMentionOptions,
} from "./message.js";
