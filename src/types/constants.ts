/**
 * WeCom 群机器人常量定义
 */

/** 企业微信群机器人 Webhook 基础地址 */
export const WEBHOOK_BASE_URL = "https://qyapi.weixin.qq.com/cgi-bin/webhook";

/** 企业微信群机器人 API 端点 (相对于 Webhook 基础地址) */
export const API_ENDPOINTS = {
    SEND: "send",
    UPLOAD_MEDIA: "upload_media",
} as const;

/** 各类限制常量 (企业微信官方文档) */
export const LIMITS = {
    /** 文本消息最大字节数 */
    TEXT_MAX_BYTES: 2048,
    /** Markdown 消息最大字节数 */
    MARKDOWN_MAX_BYTES: 4096,
    /** 图片 (base64 编码前) 最大字节数 */
    IMAGE_MAX_BYTES: 2 * 1024 * 1024,
    /** 图文消息文章数上限 */
    NEWS_MAX_ARTICLES: 8,
    NEWS_TITLE_MAX_BYTES: 128,
    NEWS_DESCRIPTION_MAX_BYTES: 512,
    /** 上传文件最小字节数 (必须大于此值) */
    UPLOAD_MIN_BYTES: 5,
    UPLOAD_FILE_MAX_BYTES: 20 * 1024 * 1024,
    UPLOAD_VOICE_MAX_BYTES: 2 * 1024 * 1024,
    /** HTTP 请求超时 */
    REQUEST_TIMEOUT_MS: 10_000,
    /** 定时器上限 (2^31 - 1 毫秒) */
    MAX_TIMEOUT_MS: 2_147_483_647,
    /** 响应体最大字节数 */
    MAX_RESPONSE_BODY_SIZE: 1024 * 1024,
} as const;
