import { maskToken, resolveToken, type TokenStore } from "../auth.js";
import { normalizeBaseUrl } from "../config.js";
import { UsageError } from "../errors.js";
import { logger } from "../logger.js";
import { renderDetail, renderJson, type Io } from "../output.js";

export type AuthContext = {
  io: Io;
  store: TokenStore;
  baseUrl: string;
  envToken?: string;
};

export const runLogin = async (ctx: AuthContext, token: string | undefined) => {
  const trimmed = token?.trim();
  if (!trimmed) {
    throw new UsageError("--token is required");
  }
  await ctx.store.save(ctx.baseUrl, trimmed);
  logger.info({ baseUrl: normalizeBaseUrl(ctx.baseUrl) }, "Saved API token");
  ctx.io.stdout.write(`Saved token for ${normalizeBaseUrl(ctx.baseUrl)}\n`);
};

export const runLogout = async (ctx: AuthContext) => {
  const removed = await ctx.store.remove(ctx.baseUrl);
  ctx.io.stdout.write(
    removed
      ? `Removed token for ${normalizeBaseUrl(ctx.baseUrl)}\n`
      : `No stored token for ${normalizeBaseUrl(ctx.baseUrl)}\n`
  );
};

export const runStatus = async (ctx: AuthContext, options: { explicit?: string; json?: boolean }) => {
  const resolved = await resolveToken({
    baseUrl: ctx.baseUrl,
    explicit: options.explicit,
    envToken: ctx.envToken,
    store: ctx.store
  });

  const status = {
    base_url: normalizeBaseUrl(ctx.baseUrl),
    authenticated: Boolean(resolved.token),
    source: resolved.source,
    token: resolved.token ? maskToken(resolved.token) : null
  };

  if (options.json) {
    ctx.io.stdout.write(renderJson(status));
    return;
  }

  ctx.io.stdout.write(
    renderDetail([
      {
        fields: [
          ["Base URL", status.base_url],
          ["Authenticated", status.authenticated ? "yes" : "no"],
          ["Source", status.source],
          ["Token", status.token ?? "-"]
        ]
      }
    ])
  );
};
