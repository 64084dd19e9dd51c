/** Tracks notifications that are queued or running so duplicates can be skipped. */
export class InFlightGuard {
  private readonly keys = new Set<string>();

  static keyFor(cameraId: string, eventId: string): string {
    return `${cameraId}\u0000${eventId}`;
  }

  acquire(key: string): boolean {
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);
    return true;
  }

  release(key: string) {
    this.keys.delete(key);
  }
}
