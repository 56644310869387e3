/**
 * WeCom 群机器人客户端
 * 发送消息 / 上传媒体文件
 */

import { readFile } from "node:fs/promises";
import path from "node:path";

import { loadWecomBotConfig, resolveWecomBotConfig, type WecomBotConfig } from "./config/index.js";
import { WecomBotError } from "./errors.js";
import { readResponseJson, wecomFetch, type WecomHttpOptions } from "./http.js";
import { buildMultipartBody, buildUploadUrl, validateUpload, type WecomMediaType } from "./media.js";
import { buildFileMessage, buildVoiceMessage, serializeWecomBotMessage } from "./message.js";
import {
    decodeSendResponse,
    decodeUploadResponse,
    type WecomSendResponse,
    type WecomUploadResponse,
} from "./response.js";
import { API_ENDPOINTS, LIMITS } from "./types/constants.js";
import type { WecomBotMessage, WecomBotOptions, WecomRuntimeEnv } from "./types/index.js";

/** 日志中只保留 key 的前 4 位；不超过 8 位的 key 完全隐藏 */
export function maskWecomKey(key: string): string {
    return key.length <= 8 ? "****" : `${key.slice(0, 4)}****`;
}

export class WecomBot {
    private readonly config: WecomBotConfig;
    private readonly runtime: WecomRuntimeEnv;
    private readonly sendUrl: string;

    /**
     * 配置无效 (如 key 为空) 时抛出 `config` 错误。
     * 未传 `proxyUrl` 时才从 `env` 读取出口代理 (默认不读取 process.env)。
     */
    constructor(options: WecomBotOptions, env: NodeJS.ProcessEnv = {}) {
        const { runtime, ...input } = options;
        this.config = resolveWecomBotConfig(input, env);
        this.runtime = runtime ?? {};
        this.sendUrl = `${this.config.baseUrl}/${API_ENDPOINTS.SEND}?key=${encodeURIComponent(this.config.key)}`;
    }

    private get http(): WecomHttpOptions {
        return { proxyUrl: this.config.proxyUrl, timeoutMs: this.config.timeoutMs };
    }

    private log(message: string): void {
        this.runtime.log?.(`[wecom-bot] ${message}`);
    }

    private logError(message: string): void {
        this.runtime.error?.(`[wecom-bot] ${message}`);
    }

    /**
     * **send (发送消息)**
     *
     * 本地校验并序列化消息后 POST 到 Webhook。
     * errcode 非 0 不会抛错，由调用方检查 (可配合 `ensureWecomOk`)。
     */
    async send(message: WecomBotMessage): Promise<WecomSendResponse> {
        const body = serializeWecomBotMessage(message);
        this.log(`send msgtype=${message.msgtype} (bytes=${Buffer.byteLength(body)})`);

        try {
            const res = await wecomFetch(this.sendUrl, {
                method: "POST",
                headers: { "Content-Type": "application/json" },
                body,
            }, this.http);
            const resp = decodeSendResponse(await readResponseJson(res, LIMITS.MAX_RESPONSE_BODY_SIZE));
            if (resp.errcode !== 0) {
                this.logError(`send ${message.msgtype} rejected: ${resp.errcode} ${resp.errmsg}`);
            }
            return resp;
        } catch (err) {
            this.logError(`send ${message.msgtype} failed: ${String(err)}`);
            throw err;
        }
    }

    /**
     * **upload (上传本地文件)**
     *
     * 读取失败时抛出 `io` 错误，不发起网络请求。
     * 返回的 media_id 仅三天内有效，用于构造 file / voice 消息。
     */
    async upload(filePath: string, type: WecomMediaType = "file"): Promise<WecomUploadResponse> {
        let buffer: Buffer;
        try {
            buffer = await readFile(filePath);
        } catch (err) {
            throw new WecomBotError("io", `failed to read upload file: ${filePath}: ${String(err)}`, { cause: err });
        }
        return this.uploadBuffer({ buffer, filename: path.basename(filePath), type });
    }

    /**
     * **uploadBuffer (上传内存中的文件内容)**
     *
     * @param params.filename 文件名 (需包含正确扩展名)
     */
    async uploadBuffer(params: {
        buffer: Uint8Array;
        filename: string;
        type?: WecomMediaType;
    }): Promise<WecomUploadResponse> {
        const { buffer, filename } = params;
        const type = params.type ?? "file";
        validateUpload({ size: buffer.byteLength, filename, type });

        const { body, contentType } = buildMultipartBody({ buffer, filename });
        this.log(`upload type=${type} filename=${filename} size=${buffer.byteLength}`);

        try {
            const res = await wecomFetch(buildUploadUrl(this.config.baseUrl, this.config.key, type), {
                method: "POST",
                headers: { "Content-Type": contentType },
                body,
            }, this.http);
            const resp = decodeUploadResponse(await readResponseJson(res, LIMITS.MAX_RESPONSE_BODY_SIZE));
            if (resp.errcode !== 0) {
                this.logError(`upload ${filename} rejected: ${resp.errcode} ${resp.errmsg}`);
            }
            return resp;
        } catch (err) {
            this.logError(`upload ${filename} failed: ${String(err)}`);
            throw err;
        }
    }

    /**
     * **sendFile (上传并发送文件)**
     *
     * 上传失败 (errcode 非 0) 时直接返回上传结果，不再发送消息。
     */
    async sendFile(filePath: string): Promise<WecomSendResponse> {
        const uploaded = await this.upload(filePath, "file");
        if (uploaded.errcode !== 0) {
            return { errcode: uploaded.errcode, errmsg: uploaded.errmsg };
        }
        return this.send(buildFileMessage(uploaded.media_id));
    }

    /** 上传 AMR 语音并发送语音消息，语义同 `sendFile` */
    async sendVoice(filePath: string): Promise<WecomSendResponse> {
        const uploaded = await this.upload(filePath, "voice");
        if (uploaded.errcode !== 0) {
            return { errcode: uploaded.errcode, errmsg: uploaded.errmsg };
        }
        return this.send(buildVoiceMessage(uploaded.media_id));
    }

    toString(): string {
        return `WecomBot(key=${maskWecomKey(this.config.key)}, baseUrl=${this.config.baseUrl})`;
    }
}

/**
 * **createWecomBotFromEnv (从环境变量创建客户端)**
 *
 * 读取 `WECOM_BOT_KEY` 等环境变量，见 `loadWecomBotConfig`。
 */
export function createWecomBotFromEnv(env: NodeJS.ProcessEnv = process.env, runtime?: WecomRuntimeEnv): WecomBot {
    const config = loadWecomBotConfig(env);
    return new WecomBot({ ...config, runtime }, env);
}
