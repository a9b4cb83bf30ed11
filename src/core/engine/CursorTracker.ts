/**
 * Tracks completion of one batch of update ids and yields the highest id below
 * which every id is complete. Committing that watermark (instead of each update's
 * own id) keeps the cursor from passing an update another worker is still on.
 */
export class CursorTracker {
  private readonly ids: number[];
  private readonly done = new Set<number>();

  constructor(
    ids: Iterable<number>,
    private readonly floor: number = 0
  ) {
    this.ids = [...new Set(ids)].sort((a, b) => a - b);
  }

  complete(id: number): void {
    this.done.add(id);
  }

  isComplete(id: number): boolean {
    return this.done.has(id);
  }

  completedIds(): number[] {
    return this.ids.filter((id) => this.done.has(id));
  }

  /** Watermark as it would be once `id` is complete too. */
  watermarkWith(id: number): number {
    let watermark = this.floor;
    for (const candidate of this.ids) {
      if (candidate !== id && !this.done.has(candidate)) {
        break;
      }
      watermark = Math.max(watermark, candidate);
    }
    return watermark;
  }

  watermark(): number {
    let watermark = this.floor;
    for (const candidate of this.ids) {
      if (!this.done.has(candidate)) {
        break;
      }
      watermark = Math.max(watermark, candidate);
    }
    return watermark;
  }
}
