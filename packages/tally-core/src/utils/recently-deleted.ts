/**
 * Bounded set of task ids removed by the sweeper, oldest evicted first.
 */
export class RecentlyDeleted {
  private readonly ids = new Set<string>();

  constructor(private readonly capacity: number) {}

  add(taskId: string): void {
    this.ids.delete(taskId);
    this.ids.add(taskId);

    while (this.ids.size > this.capacity) {
      const [oldest] = this.ids;

      if (oldest === undefined) {
        return;
      }

      this.ids.delete(oldest);
    }
  }

  has(taskId: string): boolean {
    return this.ids.has(taskId);
  }

  get size(): number {
    return this.ids.size;
  }
}
