import type { WecomNetworkConfig } from "../types/index.js";

export function resolveWecomEgressProxyUrlFromNetwork(
  network?: WecomNetworkConfig,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const fromCfg = network?.egressProxyUrl?.trim() ?? "";
  if (fromCfg) return fromCfg;

  const fromEnv = (env.WECOM_EGRESS_PROXY_URL ?? "").trim();
  return fromEnv || undefined;
}
