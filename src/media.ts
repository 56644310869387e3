import crypto from "node:crypto";
import path from "node:path";

import { WecomBotError } from "./errors.js";
import { API_ENDPOINTS, LIMITS } from "./types/constants.js";

/** 群机器人上传接口支持的媒体类型 */
export const WECOM_MEDIA_TYPES = ["file", "voice"] as const;

export type WecomMediaType = (typeof WECOM_MEDIA_TYPES)[number];

function isWecomMediaType(value: string): value is WecomMediaType {
    return WECOM_MEDIA_TYPES.some((t) => t === value);
}

/**
 * **parseWecomMediaType (解析媒体类型)**
 *
 * 大小写不敏感，未知类型抛出 `validation` 错误。
 */
export function parseWecomMediaType(raw: string): WecomMediaType {
    const normalized = raw.trim().toLowerCase();
    if (!isWecomMediaType(normalized)) {
        throw new WecomBotError("validation", `unknown upload media type: ${raw}`);
    }
    return normalized;
}

export function buildUploadUrl(baseUrl: string, key: string, type: WecomMediaType): string {
    return `${baseUrl}/${API_ENDPOINTS.UPLOAD_MEDIA}?key=${encodeURIComponent(key)}&type=${encodeURIComponent(type)}`;
}

/**
 * **validateUpload (校验上传文件)**
 *
 * - 所有类型: 文件大小必须大于 5 字节
 * - file: 不超过 20MB
 * - voice: 不超过 2MB，仅支持 AMR 格式
 */
export function validateUpload(params: { size: number; filename: string; type: WecomMediaType }): void {
    const { size, filename, type } = params;
    if (size <= LIMITS.UPLOAD_MIN_BYTES) {
        throw new WecomBotError("validation", `upload file must be larger than ${LIMITS.UPLOAD_MIN_BYTES} bytes (got ${size})`);
    }
    const max = type === "voice" ? LIMITS.UPLOAD_VOICE_MAX_BYTES : LIMITS.UPLOAD_FILE_MAX_BYTES;
    if (size > max) {
        throw new WecomBotError("validation", `upload ${type} exceeds ${max} bytes (got ${size})`);
    }
    if (type === "voice" && path.extname(filename).toLowerCase() !== ".amr") {
        throw new WecomBotError("validation", `voice upload must be an .amr file: ${filename}`);
    }
}

/**
 * **buildMultipartBody (构造 multipart/form-data 请求体)**
 *
 * 企业微信要求表单字段名为 `media`，并在 Content-Disposition 中携带 filename 和 filelength。
 */
export function buildMultipartBody(params: {
    buffer: Uint8Array;
    filename: string;
    boundary?: string;
}): { body: Buffer; contentType: string } {
    const { buffer, filename } = params;
    const boundary = params.boundary ?? `----WecomBotFormBoundary${crypto.randomBytes(16).toString("hex")}`;
    const safeName = filename.replace(/"/g, "%22").replace(/[\r\n]/g, "");

    const header = Buffer.from(
        `--${boundary}\r\n` +
        `Content-Disposition: form-data; name="media"; filename="${safeName}"; filelength=${buffer.byteLength}\r\n` +
        `Content-Type: application/octet-stream\r\n\r\n`,
    );
    const footer = Buffer.from(`\r\n--${boundary}--\r\n`);

    return {
        body: Buffer.concat([header, buffer, footer]),
        contentType: `multipart/form-data; boundary=${boundary}`,
    };
}
