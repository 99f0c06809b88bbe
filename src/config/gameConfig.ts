export interface GameConfig {
  // Countdown budget per round, in seconds
  roundSeconds: number;
  startingScore: number;
  successAward: number;
  // Grace period between the last correct entry and the success overlay
  settleDelayMs: number;
  // How long a duplicate pair stays visible before the newer entry is wiped
  invalidationDelayMs: number;
  tickIntervalMs: number;
  // Timer turns red below this many seconds
  lowTimeThreshold: number;
}

export const DEFAULT_GAME_CONFIG: Readonly<GameConfig> = Object.freeze({
  roundSeconds: 300,
  startingScore: 120,
  successAward: 50,
  settleDelayMs: 500,
  invalidationDelayMs: 2000,
  tickIntervalMs: 1000,
  lowTimeThreshold: 30,
});

const CONFIG_KEYS: readonly (keyof GameConfig)[] = [
  "roundSeconds",
  "startingScore",
  "successAward",
  "settleDelayMs",
  "invalidationDelayMs",
  "tickIntervalMs",
  "lowTimeThreshold",
];

const ZERO_ALLOWED: ReadonlySet<keyof GameConfig> = new Set<keyof GameConfig>([
  "startingScore",
  "lowTimeThreshold",
]);

export class GameConfigError extends Error {
  readonly key: keyof GameConfig;

  constructor(key: keyof GameConfig, value: number) {
    super(`Invalid game config "${key}": ${value}`);
    this.name = "GameConfigError";
    this.key = key;
  }
}

/**
 * Merge overrides onto the defaults and validate every field
 * @throws GameConfigError when a value is not a whole number in range
 */
export function resolveGameConfig(
  overrides: Partial<GameConfig> = {}
): GameConfig {
  const config: GameConfig = { ...DEFAULT_GAME_CONFIG, ...overrides };

  for (const key of CONFIG_KEYS) {
    const value = config[key];
    const min = ZERO_ALLOWED.has(key) ? 0 : 1;
    if (!Number.isInteger(value) || value < min) {
      throw new GameConfigError(key, value);
    }
  }

  return config;
}

function parseWholeNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  return Number.isInteger(value) ? value : undefined;
}

/**
 * Pick config overrides out of Vite's env (VITE_ROUND_SECONDS,
 * VITE_SETTLE_DELAY_MS). Blank or non-numeric entries are ignored.
 */
export function readEnvConfig(
  env: Record<string, string | boolean | undefined>
): Partial<GameConfig> {
  const read = (name: string) => {
    const raw = env[name];
    return typeof raw === "string" ? parseWholeNumber(raw) : undefined;
  };

  const overrides: Partial<GameConfig> = {};
  const roundSeconds = read("VITE_ROUND_SECONDS");
  if (roundSeconds !== undefined) overrides.roundSeconds = roundSeconds;
  const settleDelayMs = read("VITE_SETTLE_DELAY_MS");
  if (settleDelayMs !== undefined) overrides.settleDelayMs = settleDelayMs;
  return overrides;
}
