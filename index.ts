export { WecomBot, createWecomBotFromEnv, maskWecomKey } from "./src/bot.js";
export {
  buildTextMessage,
  buildMarkdownMessage,
  buildImageMessage,
  loadImageMessage,
  buildNewsMessage,
  buildFileMessage,
  buildVoiceMessage,
  withMentions,
  validateWecomBotMessage,
  serializeWecomBotMessage,
  WecomBotMessageSchema,
} from "./src/message.js";
export { detectImageFormat, encodeWecomImage, type WecomImageFormat } from "./src/image.js";
export {
  WECOM_MEDIA_TYPES,
  parseWecomMediaType,
  buildUploadUrl,
  buildMultipartBody,
  validateUpload,
  type WecomMediaType,
} from "./src/media.js";
export {
  decodeSendResponse,
  decodeUploadResponse,
  isWecomOk,
  ensureWecomOk,
  type WecomSendResponse,
  type WecomUploadResponse,
} from "./src/response.js";
export { WecomBotError, isWecomBotError, type WecomBotErrorKind } from "./src/errors.js";
export { wecomFetch, type WecomHttpOptions } from "./src/http.js";
export {
  WecomBotConfigSchema,
  loadWecomBotConfig,
  resolveWecomBotConfig,
  resolveWecomEgressProxyUrlFromNetwork,
  type WecomBotConfig,
  type WecomBotConfigInput,
} from "./src/config/index.js";
export * from "./src/types/index.js";
