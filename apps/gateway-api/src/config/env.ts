export type SerialConfig = {
  path: string | null;
  baudRate: number;
  interfaceSuffix: string;
  deadlineMs: number;
  reconnectDelaysMs: number[];
  debug: boolean;
};

export type PollerConfig = {
  intervalMs: number;
  netdevInterfaces: string[];
};

export type ControlConfig = {
  enabled: boolean;
  allowDangerous: boolean;
  rateLimitMax: number;
};

export type MediaConfig = {
  enabled: boolean;
  baseUrl: string;
  apiPrefix: string;
  timeoutMs: number;
  fileTimeoutMs: number;
  publicHost: string;
  publicBasePort: number;
  portOffsetBase: number;
};

export type GatewayConfig = {
  port: number;
  portExplicit: boolean;
  production: boolean;
  serial: SerialConfig;
  poller: PollerConfig;
  control: ControlConfig;
  media: MediaConfig;
};

type Env = Record<string, string | undefined>;

const text = (env: Env, name: string) => {
  const value = env[name]?.trim();
  return value === undefined || value.length === 0 ? null : value;
};

const readString = (env: Env, name: string, fallback: string) => text(env, name) ?? fallback;

const readInt = (env: Env, name: string, fallback: number, min = 0) => {
  const value = text(env, name);
  if (value === null) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${value}".`);
  }
  return parsed;
};

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

const readBool = (env: Env, name: string, fallback: boolean) => {
  const value = text(env, name);
  if (value === null) {
    return fallback;
  }
  const lower = value.toLowerCase();
  if (TRUE_VALUES.has(lower)) return true;
  if (FALSE_VALUES.has(lower)) return false;
  throw new Error(`${name} must be a boolean, got "${value}".`);
};

const readList = (env: Env, name: string, fallback: string[]) => {
  const value = text(env, name);
  if (value === null) {
    return fallback;
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
};

const readDelays = (env: Env, name: string, fallback: number[]) => {
  const entries = readList(env, name, fallback.map(String));
  const delays = entries.map(Number);
  if (delays.length === 0 || delays.some((delay) => !Number.isInteger(delay) || delay < 0)) {
    throw new Error(`${name} must be a comma-separated list of non-negative integers.`);
  }
  return delays;
};

const hostOf = (url: string, name: string) => {
  try {
    return new URL(url).hostname;
  } catch (error) {
    throw new Error(`${name} is not a valid URL: "${url}".`, { cause: error });
  }
};

/** Reads the gateway configuration; malformed values fail at startup with the variable name. */
export const loadConfig = (env: Env = process.env): GatewayConfig => {
  const baseUrl = readString(env, "MEDIA_BASE_URL", "http://192.168.99.11:8787").replace(/\/+$/, "");
  const apiPrefix = readString(env, "MEDIA_API_PREFIX", "/v1").replace(/^\/+|\/+$/g, "");
  return {
    port: readInt(env, "PORT", 8000, 1),
    portExplicit: text(env, "PORT") !== null,
    production: env.NODE_ENV === "production",
    serial: {
      path: text(env, "SERIAL_PORT") ?? "/dev/ttyUSB2",
      baudRate: readInt(env, "SERIAL_BAUD_RATE", 115200, 1),
      interfaceSuffix: readString(env, "SERIAL_INTERFACE_SUFFIX", ":1.2"),
      deadlineMs: readInt(env, "AT_DEADLINE_MS", 1200, 1),
      reconnectDelaysMs: readDelays(env, "AT_RECONNECT_DELAYS_MS", [0, 2000, 5000, 10000]),
      debug: readBool(env, "AT_DEBUG", false),
    },
    poller: {
      intervalMs: readInt(env, "POLL_INTERVAL_MS", 1000, 100),
      netdevInterfaces: readList(env, "NETDEV_INTERFACES", ["wwan0", "usb0", "eth1", "eth0"]),
    },
    control: {
      enabled: readBool(env, "CTRL_ENABLE", true),
      allowDangerous: readBool(env, "CTRL_ALLOW_DANGEROUS", false),
      rateLimitMax: readInt(env, "CTRL_RATE_LIMIT_MAX", 30, 1),
    },
    media: {
      enabled: readBool(env, "MEDIA_ENABLED", true),
      baseUrl,
      apiPrefix: apiPrefix.length > 0 ? `/${apiPrefix}` : "",
      timeoutMs: readInt(env, "MEDIA_TIMEOUT_MS", 3000, 1),
      fileTimeoutMs: readInt(env, "MEDIA_FILE_TIMEOUT_MS", 30000, 1),
      publicHost: text(env, "MEDIA_PUBLIC_HOST") ?? hostOf(baseUrl, "MEDIA_BASE_URL"),
      publicBasePort: readInt(env, "MEDIA_PUBLIC_BASE_PORT", 9550, 1),
      portOffsetBase: readInt(env, "MEDIA_PORT_OFFSET_BASE", 100),
    },
  };
};

/**
 * Control switches, read on every request so a change applies to the next one.
 */
export type ControlGates = {
  enabled: () => boolean;
  allowDangerous: () => boolean;
};

export const gatesFromConfig = (control: ControlConfig): ControlGates => ({
  enabled: () => control.enabled,
  allowDangerous: () => control.allowDangerous,
});
