import type { ReadableStream } from "node:stream/web";
import type { Dispatcher, RequestInit, Response } from "undici";
import { ProxyAgent, fetch as undiciFetch } from "undici";

import { WecomBotError } from "./errors.js";

const proxyDispatchers = new Map<string, Dispatcher>();

/**
 * **getProxyDispatcher (获取代理 Dispatcher)**
 *
 * 按代理地址缓存 ProxyAgent，同一代理复用连接池。
 */
function getProxyDispatcher(proxyUrl: string): Dispatcher {
  const existing = proxyDispatchers.get(proxyUrl);
  if (existing) return existing;
  const created = new ProxyAgent(proxyUrl);
  proxyDispatchers.set(proxyUrl, created);
  return created;
}

function mergeAbortSignal(params: {
  signal?: AbortSignal;
  timeoutMs?: number;
}): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (params.signal) signals.push(params.signal);
  if (params.timeoutMs && Number.isFinite(params.timeoutMs) && params.timeoutMs > 0) {
    signals.push(AbortSignal.timeout(params.timeoutMs));
  }
  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}

/**
 * **WecomHttpOptions (HTTP 选项)**
 *
 * @property proxyUrl 代理服务器地址
 * @property timeoutMs 请求超时时间 (毫秒)
 * @property signal AbortSignal 信号
 */
export type WecomHttpOptions = {
  proxyUrl?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
};

/**
 * **wecomFetch (统一 HTTP 请求)**
 *
 * 基于 `undici` 的 fetch 封装，自动处理 ProxyAgent 和 Timeout。
 * 传输层失败 (连接、DNS、TLS、超时) 统一转换为 `network` 错误。
 */
export async function wecomFetch(input: string | URL, init?: RequestInit, opts?: WecomHttpOptions): Promise<Response> {
  try {
    const proxyUrl = opts?.proxyUrl?.trim() ?? "";
    const dispatcher = proxyUrl ? getProxyDispatcher(proxyUrl) : undefined;

    const signal = mergeAbortSignal({ signal: opts?.signal ?? init?.signal ?? undefined, timeoutMs: opts?.timeoutMs });
    const nextInit: RequestInit = {
      ...(init ?? {}),
      ...(signal ? { signal } : {}),
      ...(dispatcher ? { dispatcher } : {}),
    };

    return await undiciFetch(input, nextInit);
  } catch (err) {
    throw new WecomBotError("network", `network failed: ${String(err)}`, { cause: err });
  }
}

/** 读取响应只需要 status 与 body */
export type WecomResponseLike = {
  status: number;
  body: ReadableStream | null;
};

/**
 * **readResponseBodyAsBuffer (读取响应 Body)**
 *
 * 将 Response Body 读取为 Buffer，超过 maxBytes 时中止读取。
 */
export async function readResponseBodyAsBuffer(res: WecomResponseLike, maxBytes?: number): Promise<Buffer> {
  if (!res.body) return Buffer.alloc(0);

  const limit = maxBytes && Number.isFinite(maxBytes) && maxBytes > 0 ? maxBytes : undefined;
  const chunks: Uint8Array[] = [];
  let total = 0;

  const reader = res.body.getReader();
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    if (!value) continue;

    total += value.byteLength;
    if (limit && total > limit) {
      await reader.cancel("body too large");
      throw new WecomBotError("decode", `response body too large (>${limit} bytes)`);
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks);
}

/**
 * **readResponseJson (读取 JSON 响应)**
 *
 * 5xx 视为 `http` 错误；其余状态码照常解析 Body (企业微信错误也会以 JSON 返回)。
 */
export async function readResponseJson(res: WecomResponseLike, maxBytes?: number): Promise<unknown> {
  if (res.status >= 500) {
    // 丢弃 Body 以释放连接；取消失败时作为 cause 保留
    const cancelError = await res.body?.cancel().then(
      () => undefined,
      (err: unknown) => err,
    );
    throw new WecomBotError("http", `wecom bot server error: ${res.status}`, { status: res.status, cause: cancelError });
  }

  let raw: Buffer;
  try {
    raw = await readResponseBodyAsBuffer(res, maxBytes);
  } catch (err) {
    if (err instanceof WecomBotError) throw err;
    throw new WecomBotError("network", `failed to read response body: ${String(err)}`, { cause: err });
  }

  try {
    return JSON.parse(raw.toString("utf8"));
  } catch (err) {
    throw new WecomBotError("decode", `could not parse response as JSON (status=${res.status})`, { cause: err });
  }
}
