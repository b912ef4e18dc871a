/**
 * Progress tracker for a fixed-size unit of work.
 *
 * The tracker is the only owner of the counter; workers report completions to
 * it and never touch the count directly. Increment and log line happen in one
 * synchronous step, so concurrent workers cannot interleave them.
 */
export class ProgressTracker {
  private completed = 0;

  constructor(
    private readonly label: string,
    readonly total: number,
    private readonly write: (line: string) => void = (line) => console.log(line)
  ) {}

  get count(): number {
    return this.completed;
  }

  percent(): string {
    if (this.total === 0) return "100.0";
    return ((this.completed / this.total) * 100).toFixed(1);
  }

  increment(detail?: string): number {
    this.completed++;
    const suffix = detail ? ` ${detail}` : "";
    this.write(`[${this.label}] ${this.completed}/${this.total} (${this.percent()}%)${suffix}`);
    return this.completed;
  }
}
