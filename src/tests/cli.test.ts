import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TokenStore } from "../auth.js";
import { runCli, VERSION } from "../cli.js";
import { captureIo, fakeFetch } from "./helpers.js";

const BASE_URL = "https://api.test";

const withCli = async (
  run: (cli: {
    exec: (...args: string[]) => Promise<number>;
    io: ReturnType<typeof captureIo>;
    requests: ReturnType<typeof fakeFetch>["requests"];
  }) => Promise<void>,
  options: { responses?: Parameters<typeof fakeFetch>; envToken?: string } = {}
) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "hyperdoc-cli-"));
  try {
    const io = captureIo();
    const fake = fakeFetch(...(options.responses ?? [{ body: { data: [] } }]));
    const store = new TokenStore(dir);
    const exec = (...args: string[]) =>
      runCli(["node", "hyperdoc", ...args, "--base-url", BASE_URL], {
        io,
        store,
        fetch: fake.fetch,
        envToken: options.envToken,
        apiPrefix: "/v1"
      });
    await run({ exec, io, requests: fake.requests });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

test("list with --json prints the view rows", async () => {
  await withCli(
    async ({ exec, io, requests }) => {
      const code = await exec("list", "brokers", "--json", "--token", "test-token");

      assert.equal(code, 0);
      assert.equal(requests[0]?.url, "https://api.test/v1/brokers");
      assert.equal(requests[0]?.headers.authorization, "Bearer test-token");
      assert.deepEqual(JSON.parse(io.out()), [
        { id: "1", company_name: "Acme", abbreviation: "", is_active: false, is_transport_only: false }
      ]);
    },
    { responses: [{ body: { data: [{ type: "brokers", id: "1", attributes: { "company-name": "Acme" } }] } }] }
  );
});

test("repeatable sparse flags reach the query", async () => {
  await withCli(async ({ exec, io, requests }) => {
    const code = await exec(
      "show",
      "broker-memberships",
      "5",
      "--fields",
      "users=name",
      "--fields",
      "brokers=company-name",
      "--include",
      "user",
      "--include",
      "broker"
    );

    assert.equal(code, 0);
    const url = new URL(requests[0]?.url ?? "");
    assert.equal(url.pathname, "/v1/broker-memberships/5");
    assert.equal(url.searchParams.get("fields[users]"), "name");
    assert.equal(url.searchParams.get("fields[brokers]"), "company-name");
    assert.equal(url.searchParams.get("include"), "user,broker");
    assert.equal(io.out(), "ID: 5\nType: broker-memberships\n");
  }, { responses: [{ body: { data: { type: "broker-memberships", id: "5" } } }] });
});

test("--no-auth sends no token even when one is configured", async () => {
  await withCli(
    async ({ exec, requests }) => {
      assert.equal(await exec("list", "brokers", "--no-auth"), 0);
      assert.equal(requests[0]?.headers.authorization, undefined);
    },
    { envToken: "env-token" }
  );
});

test("the environment token is used when no flag is given", async () => {
  await withCli(
    async ({ exec, requests }) => {
      assert.equal(await exec("list", "brokers"), 0);
      assert.equal(requests[0]?.headers.authorization, "Bearer env-token");
    },
    { envToken: "env-token" }
  );
});

test("API failures print the body and exit with 1", async () => {
  await withCli(
    async ({ exec, io }) => {
      const code = await exec("show", "brokers", "9");

      assert.equal(code, 1);
      assert.equal(io.err(), '{"errors":[{"title":"Not found"}]}\nError: GET /v1/brokers/9 failed with status 404\n');
    },
    { responses: [{ status: 404, body: '{"errors":[{"title":"Not found"}]}' }] }
  );
});

test("usage errors exit with 2", async () => {
  await withCli(async ({ exec, io, requests }) => {
    const code = await exec("delete", "brokers", "1");

    assert.equal(code, 2);
    assert.equal(io.err(), "Error: Refusing to delete brokers 1 without --confirm\n");
    assert.equal(requests.length, 0);
  });
});

test("commander rejections exit with 2 before any request", async () => {
  await withCli(async ({ exec, io, requests }) => {
    assert.equal(await exec("show", "brokers"), 2);
    assert.equal(io.err(), "error: missing required argument 'id'\n");

    assert.equal(await exec("list", "brokers", "--bogus"), 2);
    assert.equal(await exec("frobnicate"), 2);
    assert.equal(requests.length, 0);
  });
});

test("list --help exits with 0 and names the dedicated views", async () => {
  await withCli(async ({ exec, io, requests }) => {
    assert.equal(await exec("list", "--help"), 0);
    assert.ok(io.out().startsWith("Usage: hyperdoc list [options] <type>\n"));
    assert.ok(io.out().endsWith("\nDedicated views: broker-memberships, brokers. Other types use the generic view.\n"));
    assert.equal(requests.length, 0);
  });
});

test("auth login stores a token that status then reports", async () => {
  await withCli(async ({ exec, io }) => {
    assert.equal(await exec("auth", "login", "--token", "test-token"), 0);
    assert.equal(io.out(), "Saved token for https://api.test\n");

    assert.equal(await exec("auth", "status", "--json"), 0);
    const status = JSON.parse(io.out().slice("Saved token for https://api.test\n".length));
    assert.deepEqual(status, {
      base_url: "https://api.test",
      authenticated: true,
      source: "store",
      token: "test…oken"
    });
  });
});

test("auth logout reports whether anything was removed", async () => {
  await withCli(async ({ exec, io }) => {
    assert.equal(await exec("auth", "logout"), 0);
    assert.equal(io.out(), "No stored token for https://api.test\n");
  });
});

test("--version prints the version", async () => {
  await withCli(async ({ exec, io }) => {
    assert.equal(await exec("--version"), 0);
    assert.equal(io.out(), `${VERSION}\n`);
  });
});
