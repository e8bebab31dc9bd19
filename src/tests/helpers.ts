import type { Io } from "../output.js";

export type CapturedIo = Io & {
  out: () => string;
  err: () => string;
};

export const captureIo = (): CapturedIo => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    stderr: { write: (chunk: string) => stderr.push(chunk) },
    out: () => stdout.join(""),
    err: () => stderr.join("")
  };
};

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string | undefined;
};

type FakeResponse = {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
};

const headersOf = (init: RequestInit | undefined): Record<string, string> => {
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
};

/**
 * In-process stand-in for `fetch`: answers with the queued responses in order
 * (repeating the last one) and records every request.
 */
export const fakeFetch = (...responses: Array<FakeResponse | Error>) => {
  const requests: RecordedRequest[] = [];
  let position = 0;

  const impl: typeof fetch = async (input, init) => {
    requests.push({
      url: typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url,
      method: init?.method ?? "GET",
      headers: headersOf(init),
      body: typeof init?.body === "string" ? init.body : undefined
    });

    const next = responses[Math.min(position, responses.length - 1)];
    position += 1;
    if (next === undefined) {
      throw new Error("fakeFetch has no responses queued");
    }
    if (next instanceof Error) {
      throw next;
    }

    const status = next.status ?? 200;
    const text = next.body === undefined ? "" : typeof next.body === "string" ? next.body : JSON.stringify(next.body);
    return new Response(status === 204 ? null : text, { status, headers: next.headers });
  };

  return { fetch: impl, requests };
};

export const noSleep = async (_ms: number) => {};
