import { afterEach, describe, expect, it, vi } from "vitest";
import { ConnectionProvider } from "../src/db";
import { ConnectionError } from "../src/errors";
import { FakePostgres } from "./helpers/fake-postgres";
import { TEST_DB, testConfig } from "./helpers/test-app";

const setup = (env: NodeJS.ProcessEnv = {}) => {
  const pg = new FakePostgres({ databases: { [TEST_DB]: { withTable: true } } });
  const provider = new ConnectionProvider(testConfig(env).db, pg.open);
  return { pg, provider };
};

describe("ConnectionProvider", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("connects to the configured database on the first attempt", async () => {
    const { pg, provider } = setup();

    const result = await provider.connect();

    expect(result.ok).toBe(true);
    expect(pg.connectAttempts).toBe(1);
    expect(pg.connectedTo).toEqual([TEST_DB]);
  });

  it("targets the administrative database when the selector is omitted", async () => {
    const { pg, provider } = setup({ DB_ADMIN_DATABASE: "postgres" });

    const result = await provider.connect({ includeDatabase: false });

    expect(result.ok).toBe(true);
    expect(pg.connectedTo).toEqual(["postgres"]);
  });

  it("builds connection parameters from configuration", () => {
    const { provider } = setup({ DB_HOST: "db.internal", DB_USER: "app" });

    expect(provider.params(true)).toEqual({
      host: "db.internal",
      port: 5432,
      user: "app",
      password: "test-secret",
      database: TEST_DB,
      connectionTimeoutMillis: 5000,
    });
    expect(provider.params(false).database).toBe("postgres");
  });

  it("retries until an attempt succeeds", async () => {
    const { pg, provider } = setup();
    pg.refusedAttempts.add(1);
    pg.refusedAttempts.add(2);

    const result = await provider.connect({ maxAttempts: 3, delayMs: 0 });

    expect(result.ok).toBe(true);
    expect(pg.connectAttempts).toBe(3);
    expect(pg.openConnections).toBe(1);
  });

  it("returns a ConnectionError once every attempt has failed", async () => {
    const { pg, provider } = setup();
    pg.reachable = false;

    const result = await provider.connect({ maxAttempts: 4, delayMs: 0 });

    expect(pg.connectAttempts).toBe(4);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConnectionError);
    expect(result.error.message).toBe(
      "Failed to connect after 4 attempt(s): connect ECONNREFUSED 127.0.0.1:5432",
    );
  });

  it("uses the configured retry count by default", async () => {
    const { pg, provider } = setup({ DB_CONNECT_RETRIES: "2" });
    pg.reachable = false;

    await provider.connect();

    expect(pg.connectAttempts).toBe(2);
  });

  it("waits between attempts but not after the last one", async () => {
    vi.useFakeTimers();
    const { pg, provider } = setup();
    pg.reachable = false;

    const pending = provider.connect({ maxAttempts: 3, delayMs: 1000 });

    await vi.advanceTimersByTimeAsync(500);
    expect(pg.connectAttempts).toBe(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(pg.connectAttempts).toBe(2);

    await vi.advanceTimersByTimeAsync(1000);
    const result = await pending;

    expect(pg.connectAttempts).toBe(3);
    expect(result.ok).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("release closes the handle and logs instead of throwing on a second close", async () => {
    const { pg, provider } = setup();
    const result = await provider.connect();
    if (!result.ok) throw result.error;

    await provider.release(result.value);
    expect(pg.openConnections).toBe(0);

    await expect(provider.release(result.value)).resolves.toBeUndefined();
    expect(pg.openConnections).toBe(0);
  });
});
