import crypto from "node:crypto";
import { readFile } from "node:fs/promises";

import { WecomBotError } from "./errors.js";

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const JPEG_SIGNATURE = Buffer.from([0xff, 0xd8, 0xff]);

export type WecomImageFormat = "png" | "jpeg";

/**
 * 通过文件头识别图片格式；企业微信群机器人只支持 JPG 和 PNG。
 */
export function detectImageFormat(data: Uint8Array): WecomImageFormat | undefined {
    const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    if (buf.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) return "png";
    if (buf.subarray(0, JPEG_SIGNATURE.length).equals(JPEG_SIGNATURE)) return "jpeg";
    return undefined;
}

/**
 * **encodeWecomImage (图片编码)**
 *
 * 返回图片内容的 base64 编码及 md5 (均基于原始字节计算)。
 */
export function encodeWecomImage(data: Uint8Array): { base64: string; md5: string } {
    const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    return {
        base64: buf.toString("base64"),
        md5: crypto.createHash("md5").update(buf).digest("hex"),
    };
}

/**
 * **readImageFile (读取本地图片)**
 *
 * 读取失败时抛出 `io` 错误。
 */
export async function readImageFile(path: string): Promise<Buffer> {
    try {
        return await readFile(path);
    } catch (err) {
        throw new WecomBotError("io", `failed to read image file: ${path}: ${String(err)}`, { cause: err });
    }
}
