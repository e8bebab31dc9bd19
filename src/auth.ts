import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { normalizeBaseUrl } from "./config.js";
import { AuthError } from "./errors.js";
import { logger } from "./logger.js";

const credentialsSchema = z.object({
  tokens: z.record(
    z.object({
      token: z.string().min(1),
      savedAt: z.string()
    })
  )
});

export type Credentials = z.infer<typeof credentialsSchema>;

export type TokenSource = "flag" | "env" | "store" | "none";

export type ResolvedToken = {
  token: string | undefined;
  source: TokenSource;
};

const isMissingFile = (err: unknown) =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";

/** Tokens saved by `auth login`, one per base URL. */
export class TokenStore {
  constructor(private readonly dir: string) {}

  get filePath() {
    return path.join(this.dir, "credentials.json");
  }

  async read(): Promise<Credentials> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return { tokens: {} };
      throw new AuthError(`Unable to read ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new AuthError(`Credential store ${this.filePath} is not valid JSON`);
    }

    const parsed = credentialsSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthError(`Credential store ${this.filePath} has an unexpected shape`, parsed.error.flatten());
    }
    return parsed.data;
  }

  async get(baseUrl: string) {
    const credentials = await this.read();
    return credentials.tokens[normalizeBaseUrl(baseUrl)]?.token;
  }

  async save(baseUrl: string, token: string, now = new Date()) {
    const credentials = await this.read();
    credentials.tokens[normalizeBaseUrl(baseUrl)] = { token, savedAt: now.toISOString() };
    await this.write(credentials);
  }

  async remove(baseUrl: string) {
    const credentials = await this.read();
    const key = normalizeBaseUrl(baseUrl);
    if (!credentials.tokens[key]) return false;
    delete credentials.tokens[key];
    await this.write(credentials);
    return true;
  }

  private async write(credentials: Credentials) {
    await mkdir(this.dir, { recursive: true, mode: 0o700 });
    await writeFile(this.filePath, `${JSON.stringify(credentials, null, 2)}\n`, { mode: 0o600 });
  }
}

/**
 * Token lookup order: explicit flag, environment, then the credential store.
 * Finding nothing is not an error; the request simply goes out unauthenticated.
 */
export const resolveToken = async (options: {
  baseUrl: string;
  explicit?: string;
  envToken?: string;
  store: TokenStore;
}): Promise<ResolvedToken> => {
  const explicit = options.explicit?.trim();
  if (explicit) return { token: explicit, source: "flag" };

  const envToken = options.envToken?.trim();
  if (envToken) return { token: envToken, source: "env" };

  const stored = await options.store.get(options.baseUrl);
  if (stored) {
    logger.debug({ baseUrl: normalizeBaseUrl(options.baseUrl) }, "Using stored API token");
    return { token: stored, source: "store" };
  }

  return { token: undefined, source: "none" };
};

export const maskToken = (token: string) => (token.length <= 8 ? "****" : `${token.slice(0, 4)}…${token.slice(-4)}`);
