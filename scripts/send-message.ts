import { buildMarkdownMessage, buildTextMessage, createWecomBotFromEnv, isWecomOk } from "../index.js";

const args = process.argv.slice(2);

const markdown = args.includes("--markdown");
const fileIndex = args.indexOf("--file");
const filePath = fileIndex !== -1 ? args[fileIndex + 1] : undefined;
const text = args.filter((arg, i) => !arg.startsWith("--") && (fileIndex === -1 || i !== fileIndex + 1)).join(" ");

if (!text && !filePath) {
  console.error("Usage: WECOM_BOT_KEY=<key> npx tsx scripts/send-message.ts [--markdown] <text>");
  console.error("   OR: WECOM_BOT_KEY=<key> npx tsx scripts/send-message.ts --file <path>");
  process.exit(1);
}

async function run() {
  const bot = createWecomBotFromEnv(process.env, {
    log: (message) => console.log(message),
    error: (message) => console.error(message),
  });
  console.log(`Using ${bot.toString()}`);

  const resp = filePath
    ? await bot.sendFile(filePath)
    : await bot.send(markdown ? buildMarkdownMessage(text) : buildTextMessage(text));

  if (!isWecomOk(resp)) {
    console.error(`❌ WeCom rejected the message: ${resp.errcode} ${resp.errmsg}`);
    process.exit(1);
  }
  console.log("✅ Sent!");
}

run().catch((err: unknown) => {
  console.error("❌ Send failed:", err);
  process.exit(1);
});
