import type http from "node:http";
import { getEnv } from "./env.js";
import { createInspectionApp } from "./http/app.js";
import { LogBuffer } from "./logging/logBuffer.js";
import type { LogEntry } from "./logging/logTypes.js";
import { FakeLogstashService } from "./service/fakeLogstashService.js";

function formatEntry(entry: LogEntry): string {
  const details = entry.details ? ` ${JSON.stringify(entry.details)}` : "";
  return `${entry.ts} ${entry.level.toUpperCase()} [${entry.scope}] ${entry.message}${details}`;
}

function listen(app: ReturnType<typeof createInspectionApp>, port: number, host: string): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => resolve(server));
    server.once("error", reject);
  });
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

async function main(): Promise<void> {
  const env = getEnv();
  const diagnostics = new LogBuffer({ dataDir: env.DATA_DIR, maxEntries: env.LOG_MAX_ENTRIES });
  diagnostics.onAppend((entry) => {
    // eslint-disable-next-line no-console
    console.log(formatEntry(entry));
  });

  const logstash = await FakeLogstashService.create({
    port: env.LOGSTASH_PORT,
    delimiter: env.LOGSTASH_DELIMITER,
    encoding: env.LOGSTASH_ENCODING,
    stopTimeoutMs: env.LOGSTASH_STOP_TIMEOUT_MS,
    containerHost: env.LOGSTASH_CONTAINER_HOST,
    logger: diagnostics,
  });
  logstash.start();

  const server = await listen(createInspectionApp({ logstash, diagnostics }), env.INSPECT_PORT, env.INSPECT_HOST);
  diagnostics.append({
    level: "info",
    scope: "main",
    message: "Inspection API listening.",
    details: { host: env.INSPECT_HOST, port: env.INSPECT_PORT, logstashPort: logstash.port },
  });

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (stopping) return stopping;
    const pending = (async () => {
      await closeServer(server);
      await logstash.stop();
      await diagnostics.flush();
    })();
    stopping = pending;
    return pending;
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          // eslint-disable-next-line no-console
          console.error(`fake-logstash failed to stop: ${message}`);
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  // eslint-disable-next-line no-console
  console.error(`fake-logstash failed to start: ${message}`);
  process.exit(1);
});
