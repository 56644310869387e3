/**
 * WeCom 群机器人消息类型定义
 *
 * 字段名与企业微信 Webhook 接口保持一致 (snake_case)。
 */

/**
 * **WecomTextMessage (文本消息)**
 *
 * @property content 文本内容，最长 2048 字节
 * @property mentioned_list 需要 @ 的成员 userid 列表，"@all" 表示所有人
 * @property mentioned_mobile_list 需要 @ 的成员手机号列表 (拿不到 userid 时使用)
 */
export type WecomTextMessage = {
    msgtype: "text";
    text: {
        content: string;
        mentioned_list?: string[];
        mentioned_mobile_list?: string[];
    };
};

export type WecomMarkdownMessage = {
    msgtype: "markdown";
    markdown: { content: string };
};

/**
 * **WecomImageMessage (图片消息)**
 *
 * @property base64 图片内容的 base64 编码
 * @property md5 图片内容 (base64 编码前) 的 md5 值
 */
export type WecomImageMessage = {
    msgtype: "image";
    image: { base64: string; md5: string };
};

/**
 * **WecomNewsArticle (图文消息文章)**
 *
 * @property title 标题，最长 128 字节
 * @property description 描述，最长 512 字节
 * @property url 点击后跳转的链接
 * @property picurl 图片链接，支持 JPG、PNG
 */
export type WecomNewsArticle = {
    title: string;
    description?: string;
    url: string;
    picurl?: string;
};

export type WecomNewsMessage = {
    msgtype: "news";
    news: { articles: WecomNewsArticle[] };
};

export type WecomFileMessage = {
    msgtype: "file";
    file: { media_id: string };
};

export type WecomVoiceMessage = {
    msgtype: "voice";
    voice: { media_id: string };
};

/**
 * 群机器人出站消息 (按 msgtype 区分)
 */
export type WecomBotMessage =
    | WecomTextMessage
    | WecomMarkdownMessage
    | WecomImageMessage
    | WecomNewsMessage
    | WecomFileMessage
    | WecomVoiceMessage;

export type WecomBotMessageType = WecomBotMessage["msgtype"];

/** 文本消息的 @ 成员选项 */
export type WecomMentionOptions = {
    mentionedList?: string[];
    mentionedMobileList?: string[];
};
