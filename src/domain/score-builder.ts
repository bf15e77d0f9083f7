export const REASON_DELIMITER = ";";

export function formatDelta(points: number): string {
  return points >= 0 ? `+${points}` : String(points);
}

export function formatReason(rule: string, value: string | number | undefined, points: number): string {
  const label = value === undefined ? rule : `${rule}:${value}`;
  return `${label}(${formatDelta(points)})`;
}

/** Running score and reason trail for a single evaluation. */
export class ScoreBuilder {
  private total = 0;
  private readonly trail: string[] = [];

  get score(): number {
    return this.total;
  }

  get reasons(): readonly string[] {
    return this.trail;
  }

  /** Adds a non-zero delta; zero deltas leave no trace. */
  add(points: number, rule: string, value?: string | number): void {
    if (points === 0) {
      return;
    }
    this.record(points, rule, value);
  }

  /** Adds a delta and always records its reason, including `(+0)`. */
  record(points: number, rule: string, value?: string | number): void {
    this.total += points;
    this.trail.push(formatReason(rule, value, points));
  }

  textReasons(delimiter = REASON_DELIMITER): string {
    return this.trail.join(delimiter);
  }
}
