/**
 * WeCom 群机器人配置类型定义
 */

/**
 * **WecomRuntimeEnv (运行时环境)**
 *
 * 基础的日志和错误报告接口，由调用方注入。未注入时不输出任何日志。
 */
export type WecomRuntimeEnv = {
    log?: (message: string) => void;
    error?: (message: string) => void;
};

/** 网络配置 */
export type WecomNetworkConfig = {
    /**
     * 出口代理（用于企业可信 IP 固定出口场景）。
     * 示例: "http://proxy.company.local:3128"
     */
    egressProxyUrl?: string;
};

/**
 * **WecomBotOptions (群机器人客户端选项)**
 *
 * @property key Webhook 地址中的 key (企业微信群机器人创建时生成)
 * @property timeoutMs 请求超时时间 (毫秒) [默认: 10000]
 * @property proxyUrl 出口代理地址
 * @property baseUrl Webhook 基础地址 [默认: https://qyapi.weixin.qq.com/cgi-bin/webhook]
 * @property runtime 日志输出
 */
export type WecomBotOptions = {
    key: string;
    timeoutMs?: number;
    proxyUrl?: string;
    baseUrl?: string;
    runtime?: WecomRuntimeEnv;
};
