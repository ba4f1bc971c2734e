import Redis from "ioredis";

export function createKeydbClient(url: string, clientName: string): Redis {
  const keydb = new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });
  keydb.on("error", (error) => {
    console.error("[keydb] error", error);
  });

  keydb
    .client("SETNAME", clientName)
    .catch((error) => console.warn("[keydb] failed to set client name", error));

  return keydb;
}

export async function pingKeydb(keydb: Redis) {
  const startedAt = Date.now();
  try {
    await keydb.ping();
    return { ok: true, latencyMs: Date.now() - startedAt, error: null };
  } catch (error) {
    return {
      ok: false,
      latencyMs: null,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
