import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { WecomBot, createWecomBotFromEnv, maskWecomKey } from "./bot.js";
import { WecomBotError, isWecomBotError } from "./errors.js";
import { buildMarkdownMessage, buildNewsMessage, buildTextMessage } from "./message.js";

const { undiciFetch } = vi.hoisted(() => {
    const undiciFetch = vi.fn();
    return { undiciFetch };
});

vi.mock("undici", () => ({
    fetch: undiciFetch,
    ProxyAgent: class ProxyAgent {
        constructor(readonly url: string) { }
    },
}));

const SEND_URL = "https://qyapi.weixin.qq.com/cgi-bin/webhook/send?key=test-key";
const UPLOAD_URL = "https://qyapi.weixin.qq.com/cgi-bin/webhook/upload_media?key=test-key&type=file";

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("WecomBot", () => {
    let dir = "";

    beforeEach(async () => {
        undiciFetch.mockReset();
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "wecom-bot-"));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    function makeBot(runtime?: { log?: (m: string) => void; error?: (m: string) => void }) {
        return new WecomBot({ key: "test-key", runtime }, {});
    }

    it("rejects a blank key at construction", () => {
        expect(() => new WecomBot({ key: "" }, {})).toThrow(expect.objectContaining({ kind: "config" }));
    });

    it("sends a serialized message to the webhook url", async () => {
        undiciFetch.mockResolvedValueOnce(jsonResponse({ errcode: 0, errmsg: "ok" }));
        const log = vi.fn();
        const bot = makeBot({ log });

        const resp = await bot.send(buildMarkdownMessage("> hello world"));

        expect(resp).toEqual({ errcode: 0, errmsg: "ok" });
        expect(undiciFetch).toHaveBeenCalledTimes(1);
        expect(undiciFetch).toHaveBeenCalledWith(
            SEND_URL,
            expect.objectContaining({
                method: "POST",
                headers: { "Content-Type": "application/json" },
                body: '{"msgtype":"markdown","markdown":{"content":"> hello world"}}',
                signal: expect.anything(),
            }),
        );
        expect(log).toHaveBeenCalledWith("[wecom-bot] send msgtype=markdown (bytes=61)");
    });

    it("returns vendor errors as data", async () => {
        undiciFetch.mockResolvedValueOnce(jsonResponse({ errcode: 93000, errmsg: "invalid key" }));
        const error = vi.fn();
        const bot = makeBot({ error });

        const resp = await bot.send(buildTextMessage("hi", { mentionedList: ["1000"] }));

        expect(resp).toEqual({ errcode: 93000, errmsg: "invalid key" });
        expect(error).toHaveBeenCalledWith("[wecom-bot] send text rejected: 93000 invalid key");
    });

    it("fails validation before any network call", async () => {
        const bot = makeBot();
        await expect(bot.send(buildNewsMessage([]))).rejects.toMatchObject({ kind: "validation" });
        expect(undiciFetch).not.toHaveBeenCalled();
    });

    it("maps 5xx to http error", async () => {
        undiciFetch.mockResolvedValueOnce(new Response("bad gateway", { status: 502 }));
        await expect(makeBot().send(buildTextMessage("hi"))).rejects.toMatchObject({
            kind: "http",
            status: 502,
            message: "wecom bot server error: 502",
        });
    });

    it("maps non-JSON body to decode error", async () => {
        undiciFetch.mockResolvedValueOnce(new Response("<html>not json</html>", { status: 200 }));
        await expect(makeBot().send(buildTextMessage("hi"))).rejects.toMatchObject({ kind: "decode" });
    });

    it("still decodes JSON bodies of 4xx responses", async () => {
        undiciFetch.mockResolvedValueOnce(jsonResponse({ errcode: 45009, errmsg: "api freq out of limit" }, 429));
        await expect(makeBot().send(buildTextMessage("hi"))).resolves.toEqual({
            errcode: 45009,
            errmsg: "api freq out of limit",
        });
    });

    it("maps transport failures to network error and logs them", async () => {
        const failure = new TypeError("fetch failed");
        undiciFetch.mockRejectedValueOnce(failure);
        const error = vi.fn();

        const err = await makeBot({ error }).send(buildTextMessage("hi")).catch((e: unknown) => e);

        expect(err).toBeInstanceOf(WecomBotError);
        expect(err).toMatchObject({ kind: "network", cause: failure });
        expect(isWecomBotError(err, "network")).toBe(true);
        expect(isWecomBotError(err, "http")).toBe(false);
        expect(error).toHaveBeenCalledWith("[wecom-bot] send text failed: WecomBotError: network failed: TypeError: fetch failed");
    });

    it("passes a proxy dispatcher when proxyUrl is set", async () => {
        undiciFetch.mockResolvedValueOnce(jsonResponse({ errcode: 0, errmsg: "ok" }));
        const bot = new WecomBot({ key: "test-key", proxyUrl: "http://127.0.0.1:7890" }, {});

        await bot.send(buildTextMessage("hi"));

        const init = undiciFetch.mock.calls[0]?.[1];
        expect(init).toMatchObject({ dispatcher: { url: "http://127.0.0.1:7890" } });
    });

    it("upload fails with io error for a missing file without network call", async () => {
        await expect(makeBot().upload(path.join(dir, "missing.txt"))).rejects.toMatchObject({ kind: "io" });
        expect(undiciFetch).not.toHaveBeenCalled();
    });

    it("uploads a local file as multipart media", async () => {
        const file = path.join(dir, "report.txt");
        await fs.writeFile(file, "quarterly report");
        undiciFetch.mockResolvedValueOnce(
            jsonResponse({ errcode: 0, errmsg: "ok", type: "file", media_id: "MEDIA_ID", created_at: "1380000000" }),
        );

        const resp = await makeBot().upload(file);

        expect(resp).toEqual({ errcode: 0, errmsg: "ok", type: "file", media_id: "MEDIA_ID", created_at: "1380000000" });
        const [url, init] = undiciFetch.mock.calls[0] ?? [];
        expect(url).toBe(UPLOAD_URL);
        expect(init.method).toBe("POST");
        expect(init.headers["Content-Type"]).toMatch(/^multipart\/form-data; boundary=/);
        const body = Buffer.from(init.body).toString("utf8");
        expect(body).toContain('name="media"; filename="report.txt"; filelength=16\r\n');
        expect(body).toContain("\r\n\r\nquarterly report\r\n");
    });

    it("maps 5xx on upload to http error", async () => {
        undiciFetch.mockResolvedValueOnce(new Response("bad gateway", { status: 502 }));
        const error = vi.fn();

        await expect(
            makeBot({ error }).uploadBuffer({ buffer: Buffer.from("quarterly report"), filename: "a.txt" }),
        ).rejects.toMatchObject({ kind: "http", status: 502 });
        expect(error).toHaveBeenCalledWith("[wecom-bot] upload a.txt failed: WecomBotError: wecom bot server error: 502");
    });

    it("maps non-JSON upload body to decode error", async () => {
        undiciFetch.mockResolvedValueOnce(new Response("<html>not json</html>", { status: 200 }));
        await expect(
            makeBot().uploadBuffer({ buffer: Buffer.from("quarterly report"), filename: "a.txt" }),
        ).rejects.toMatchObject({ kind: "decode" });
    });

    it("rejects too small uploads before network call", async () => {
        await expect(
            makeBot().uploadBuffer({ buffer: Buffer.from("tiny"), filename: "a.txt" }),
        ).rejects.toMatchObject({ kind: "validation" });
        expect(undiciFetch).not.toHaveBeenCalled();
    });

    it("sendFile uploads then sends a file message", async () => {
        const file = path.join(dir, "report.txt");
        await fs.writeFile(file, "quarterly report");
        undiciFetch
            .mockResolvedValueOnce(jsonResponse({ errcode: 0, errmsg: "ok", type: "file", media_id: "MEDIA_ID" }))
            .mockResolvedValueOnce(jsonResponse({ errcode: 0, errmsg: "ok" }));

        const resp = await makeBot().sendFile(file);

        expect(resp).toEqual({ errcode: 0, errmsg: "ok" });
        expect(undiciFetch).toHaveBeenCalledTimes(2);
        expect(undiciFetch.mock.calls[1]?.[0]).toBe(SEND_URL);
        expect(undiciFetch.mock.calls[1]?.[1].body).toBe('{"msgtype":"file","file":{"media_id":"MEDIA_ID"}}');
    });

    it("sendFile returns upload failure without sending", async () => {
        const file = path.join(dir, "report.txt");
        await fs.writeFile(file, "quarterly report");
        undiciFetch.mockResolvedValueOnce(jsonResponse({ errcode: 93000, errmsg: "invalid key" }));

        await expect(makeBot().sendFile(file)).resolves.toEqual({ errcode: 93000, errmsg: "invalid key" });
        expect(undiciFetch).toHaveBeenCalledTimes(1);
    });

    it("sendVoice uploads amr with voice type", async () => {
        const file = path.join(dir, "memo.amr");
        await fs.writeFile(file, Buffer.from("#!AMR\n0000"));
        undiciFetch
            .mockResolvedValueOnce(jsonResponse({ errcode: 0, errmsg: "ok", type: "voice", media_id: "VOICE_ID" }))
            .mockResolvedValueOnce(jsonResponse({ errcode: 0, errmsg: "ok" }));

        await makeBot().sendVoice(file);

        expect(undiciFetch.mock.calls[0]?.[0]).toBe(
            "https://qyapi.weixin.qq.com/cgi-bin/webhook/upload_media?key=test-key&type=voice",
        );
        expect(undiciFetch.mock.calls[1]?.[1].body).toBe('{"msgtype":"voice","voice":{"media_id":"VOICE_ID"}}');
    });

    it("never exposes the key in toString", () => {
        const bot = new WecomBot({ key: "abcdef-secret" }, {});
        expect(bot.toString()).toBe("WecomBot(key=abcd****, baseUrl=https://qyapi.weixin.qq.com/cgi-bin/webhook)");
        expect(maskWecomKey("ab")).toBe("****");
        expect(maskWecomKey("12345678")).toBe("****");
        expect(maskWecomKey("123456789")).toBe("1234****");
    });

    it("hides a short key entirely in toString", () => {
        const bot = new WecomBot({ key: "abc" }, {});
        expect(bot.toString()).toBe("WecomBot(key=****, baseUrl=https://qyapi.weixin.qq.com/cgi-bin/webhook)");
    });

    it("does not read the egress proxy from process.env by default", async () => {
        undiciFetch.mockResolvedValueOnce(jsonResponse({ errcode: 0, errmsg: "ok" }));
        vi.stubEnv("WECOM_EGRESS_PROXY_URL", "http://127.0.0.1:8888");
        try {
            await new WecomBot({ key: "test-key" }).send(buildTextMessage("hi"));
        } finally {
            vi.unstubAllEnvs();
        }

        expect(undiciFetch.mock.calls[0]?.[1]).not.toHaveProperty("dispatcher");
    });

    it("keeps an explicit proxyUrl over the environment", async () => {
        undiciFetch.mockResolvedValueOnce(jsonResponse({ errcode: 0, errmsg: "ok" }));
        const bot = new WecomBot(
            { key: "test-key", proxyUrl: "http://127.0.0.1:7890" },
            { WECOM_EGRESS_PROXY_URL: "http://127.0.0.1:8888" },
        );

        await bot.send(buildTextMessage("hi"));

        expect(undiciFetch.mock.calls[0]?.[1]).toMatchObject({ dispatcher: { url: "http://127.0.0.1:7890" } });
    });

    it("creates a bot from environment", async () => {
        undiciFetch.mockResolvedValueOnce(jsonResponse({ errcode: 0, errmsg: "ok" }));
        const bot = createWecomBotFromEnv({ WECOM_BOT_KEY: "test-key", WECOM_BOT_BASE_URL: "http://127.0.0.1:9000/hook" });

        await bot.send(buildTextMessage("hi"));

        expect(undiciFetch.mock.calls[0]?.[0]).toBe("http://127.0.0.1:9000/hook/send?key=test-key");
    });
});
