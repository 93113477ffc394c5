export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

export function distanceSq(x1: number, y1: number, x2: number, y2: number): number {
  const dx = x2 - x1;
  const dy = y2 - y1;
  return dx * dx + dy * dy;
}

/** Strict overlap: tangent circles do not collide. */
export function circlesOverlap(
  x1: number, y1: number, r1: number,
  x2: number, y2: number, r2: number,
): boolean {
  const rr = r1 + r2;
  return distanceSq(x1, y1, x2, y2) < rr * rr;
}

/** True when (x, y) lies strictly inside `radius` of (cx, cy). */
export function insideRadius(cx: number, cy: number, radius: number, x: number, y: number): boolean {
  if (radius < 0) return false;
  return distanceSq(cx, cy, x, y) < radius * radius;
}

export function headingRad(dx: number, dy: number): number {
  return Math.atan2(dy, dx);
}

export function rotate(vx: number, vy: number, angleRad: number): { vx: number; vy: number } {
  const c = Math.cos(angleRad);
  const s = Math.sin(angleRad);
  return { vx: vx * c - vy * s, vy: vx * s + vy * c };
}
