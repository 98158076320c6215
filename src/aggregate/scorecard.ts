import type { CameraEvent, SpeedingEvent, YardScore } from "../shared/types.js";
import { rate } from "../shared/stats.js";

/**
 * Events per vehicle for each yard, highest first. Equal rates keep
 * configured yard order; a yard with no vehicles scores 0.
 *
 * Events are expected to be pre-filtered to one division; events for
 * yards outside `yardOrder` are not scored.
 */
export function buildYardScorecard(
  camera: readonly CameraEvent[],
  speeding: readonly SpeedingEvent[],
  vehicleCounts: ReadonlyMap<string, number>,
  yardOrder: readonly string[]
): YardScore[] {
  const scores = yardOrder.map((yard) => {
    const cameraCount = camera.filter((e) => e.yard === yard).length;
    const speedingCount = speeding.filter((e) => e.yard === yard).length;
    const vehicles = vehicleCounts.get(yard) ?? 0;
    const total = cameraCount + speedingCount;
    return {
      rank: 0,
      yard,
      vehicles,
      camera: cameraCount,
      speeding: speedingCount,
      total,
      rate: rate(total, vehicles),
    };
  });

  return scores
    .sort((a, b) => b.rate - a.rate)
    .map((score, i) => ({ ...score, rank: i + 1 }));
}
