/**
 * Arena simulation constants (authoritative).
 *
 * All gameplay numbers live here.
 * Durations are in ticks; distances in world units.
 */

export const ARENA_CONFIG = {
  // World
  mapWidth: 1000,
  mapHeight: 1000,

  // Collision radius per entity kind
  radius: {
    player: 10,
    bullet: 2,
    rock: 20,
    gun: 8,
    ammo: 6,
  },

  // Spatial hash (at least the largest diameter keeps most shapes in <= 4 cells)
  gridCellSize: 40,
  freeMaxAttempts: 1000,

  // Safe zone: starts around the map corners, closes a little every tick
  zone: {
    initialRadius: 710,
    shrinkPerTick: 0.05,
  },

  // Seeding
  initialRocks: 20,
  initialGuns: 8,
  initialAmmo: 15,

  // Periodic spawns
  ammoSpawn: { intervalTicks: 150, batch: 3 },
  gunSpawn: { intervalTicks: 300, batch: 1 },

  // Combat
  playerHealth: 100,
  bulletTimeoutTicks: 60,
  gunCooldownDecay: 1,

  // Interest management
  visionRadius: 300,
} as const;
