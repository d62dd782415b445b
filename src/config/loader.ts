// Config loader: reads ~/.config/host-hardening/config.yaml and deep-merges it over defaults.
// The merged document is validated with zod; an invalid file is an error, never silently ignored.
// Config shape is defined in src/types/config.ts; add new fields there, in the schema and in DEFAULT_CONFIG.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import type { HardeningConfig } from "../types/config.js";
import { HardeningError, HardeningErrorCode, errorMessage } from "../errors.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "host-hardening", "config.yaml");

export const DEFAULT_CONFIG: HardeningConfig = {
  privilege: { require_root: true },
  errors: { command_timeout_ceiling: 0 },
  sshd: {
    main_config: "/etc/ssh/sshd_config",
    dropin_dir: "/etc/ssh/sshd_config.d",
    dropin_path: "/etc/ssh/sshd_config.d/99-strong-crypto.conf",
    backup_dir: "/etc/ssh/backup",
    kex_algorithms: [
      "sntrup761x25519-sha512@openssh.com",
      "curve25519-sha256",
      "curve25519-sha256@libssh.org",
      "ecdh-sha2-nistp256",
      "ecdh-sha2-nistp384",
      "ecdh-sha2-nistp521",
      "diffie-hellman-group14-sha256",
      "diffie-hellman-group16-sha512",
      "diffie-hellman-group18-sha512",
    ],
    macs: [
      "hmac-sha2-256-etm@openssh.com",
      "hmac-sha2-512-etm@openssh.com",
      "umac-64-etm@openssh.com",
      "umac-128-etm@openssh.com",
    ],
    host_key_algorithms: [
      "ssh-ed25519",
      "ecdsa-sha2-nistp256",
      "ecdsa-sha2-nistp384",
      "ecdsa-sha2-nistp521",
      "rsa-sha2-256",
      "rsa-sha2-512",
    ],
  },
  rpcbind: { package: "rpcbind", units: ["rpcbind.socket", "rpcbind.service"], port: 111 },
  ip_forward: { key: "net.ipv4.ip_forward", desired: "0", conf_path: "/etc/sysctl.d/99-ipforward.conf" },
  profiles: { disabled: [] },
};

const algorithmList = z.array(z.string().regex(/^[A-Za-z0-9@._+-]+$/, "algorithm names cannot contain spaces or commas")).min(1);
const absolutePath = z.string().startsWith("/", "must be an absolute path");

export const configSchema: z.ZodType<HardeningConfig> = z.object({
  privilege: z.object({ require_root: z.boolean() }),
  errors: z.object({ command_timeout_ceiling: z.number().int().min(0) }),
  sshd: z.object({
    main_config: absolutePath,
    dropin_dir: absolutePath,
    dropin_path: absolutePath,
    backup_dir: absolutePath,
    kex_algorithms: algorithmList,
    macs: algorithmList,
    host_key_algorithms: algorithmList,
  }),
  rpcbind: z.object({
    package: z.string().min(1),
    units: z.array(z.string().regex(/\.(service|socket)$/, "must be a .service or .socket unit")).min(1),
    port: z.number().int().min(1).max(65535),
  }),
  ip_forward: z.object({
    key: z.string().regex(/^[a-z0-9_]+(\.[a-z0-9_]+)+$/, "must be a dotted sysctl key"),
    desired: z.string().min(1),
    conf_path: absolutePath,
  }),
  profiles: z.object({ disabled: z.array(z.string()) }),
});

const DEFAULT_CONFIG_HEADER = `# host-hardening configuration
# Every value shown is a default. The sshd algorithm lists are used both to write
# the drop-in and to check 'sshd -T' output, so edit them here and nowhere else.
`;

export interface ConfigResult {
  config: HardeningConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    if (explicitPath) {
      throw new HardeningError(HardeningErrorCode.CONFIG_INVALID, `Config file not found: ${configPath}`, { configPath });
    }
    logger.info({ configPath }, "No config file found - using defaults");
    return { config: DEFAULT_CONFIG, configPath, firstRun: true };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new HardeningError(HardeningErrorCode.CONFIG_INVALID, `Could not parse ${configPath}: ${errorMessage(err)}`, { configPath });
  }

  const result = configSchema.safeParse(deepMerge(DEFAULT_CONFIG, parsed ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    logger.error({ configPath, issues }, "Invalid configuration");
    throw new HardeningError(HardeningErrorCode.CONFIG_INVALID, `Invalid configuration in ${configPath}: ${issues.join("; ")}`, { configPath, issues });
  }
  return { config: result.data, configPath, firstRun: false };
}

/** Write the commented default config. Refuses to overwrite unless forced. */
export function writeDefaultConfig(configPath: string = DEFAULT_CONFIG_PATH, force = false): string {
  if (existsSync(configPath) && !force) {
    throw new HardeningError(HardeningErrorCode.CONFIG_INVALID, `${configPath} already exists (use --force to overwrite)`, { configPath });
  }
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, DEFAULT_CONFIG_HEADER + stringifyYaml(DEFAULT_CONFIG), "utf-8");
  logger.info({ configPath }, "Wrote default config");
  return configPath;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides; arrays are replaced, not concatenated). */
export function deepMerge(a: unknown, b: unknown): unknown {
  if (!isPlainObject(a) || !isPlainObject(b)) return b === undefined ? a : b;
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
