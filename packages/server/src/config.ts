/**
 * Environment configuration
 */

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function booleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = optionalEnv(name, defaultValue ? "true" : "false").toLowerCase();
  return raw === "true" || raw === "1" || raw === "yes";
}

export const config = {
  // Server
  port: parseInt(optionalEnv("PORT", "2567"), 10),
  nodeEnv: optionalEnv("NODE_ENV", "development"),

  // Simulation scheduler (~30 ticks per second)
  tickMs: parseInt(optionalEnv("TICK_MS", "33"), 10),

  // Drop games once their last player is gone
  retireEmptyGames: booleanEnv("RETIRE_EMPTY_GAMES", true),
} as const;
