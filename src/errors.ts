/**
 * **WecomBotErrorKind (错误类型)**
 *
 * - `config`: 客户端配置无效 (如缺少 key)
 * - `validation`: 消息或上传文件不满足企业微信限制，未发起请求
 * - `network`: 网络/传输失败 (连接、DNS、TLS、超时)
 * - `http`: 服务端返回 5xx
 * - `decode`: 响应不是合法 JSON 或字段不符合预期
 * - `io`: 本地文件读取失败
 * - `api`: 企业微信返回非 0 errcode (仅由 `ensureWecomOk` 抛出)
 */
export type WecomBotErrorKind = "config" | "validation" | "network" | "http" | "decode" | "io" | "api";

export class WecomBotError extends Error {
    readonly kind: WecomBotErrorKind;
    /** HTTP 状态码 (kind = "http") */
    readonly status?: number;
    /** 企业微信 errcode (kind = "api") */
    readonly errcode?: number;

    constructor(
        kind: WecomBotErrorKind,
        message: string,
        options?: { cause?: unknown; status?: number; errcode?: number },
    ) {
        super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = "WecomBotError";
        this.kind = kind;
        this.status = options?.status;
        this.errcode = options?.errcode;
    }
}

export function isWecomBotError(err: unknown, kind?: WecomBotErrorKind): err is WecomBotError {
    return err instanceof WecomBotError && (kind === undefined || err.kind === kind);
}
