import { z } from "zod";
import { MAX_TIMER_DELAY_MS } from "./net/shutdownCoordinator.js";
import { defaultContainerHost } from "./service/hosts.js";

const ESCAPES: Record<string, string> = { n: "\n", r: "\r", t: "\t", "0": "\0", "\\": "\\" };

/**
 * Turn `\n`-style escapes into the characters they name, so a delimiter can live in an env var.
 */
export function unescapeDelimiter(raw: string): string {
  return raw.replace(/\\([nrt0\\])/g, (_m, ch: string) => ESCAPES[ch] ?? ch);
}

function isKnownEncoding(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
}

const PortSchema = z.coerce.number().int().min(0).max(65535);

const EnvSchema = z.object({
  LOGSTASH_PORT: PortSchema.default(0),
  LOGSTASH_CONTAINER_HOST: z.string().min(1).default(defaultContainerHost()),
  LOGSTASH_DELIMITER: z.string().min(1).default("\\n").transform(unescapeDelimiter),
  LOGSTASH_ENCODING: z.string().refine(isKnownEncoding, "unknown text encoding").default("utf-8"),
  LOGSTASH_STOP_TIMEOUT_MS: z.coerce.number().int().min(1).max(MAX_TIMER_DELAY_MS).default(5000),
  INSPECT_PORT: PortSchema.default(8788),
  INSPECT_HOST: z.string().default("0.0.0.0"),
  DATA_DIR: z.string().default("data/fake-logstash"),
  LOG_MAX_ENTRIES: z.coerce.number().int().min(1).default(3000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parse and validate the runtime environment.
 */
export function getEnv(input: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(input);
}
