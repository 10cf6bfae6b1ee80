/**
 * One-way readiness latch shared between a controller and the components it
 * renders. Components typically return `flag.isReady()` from `ready()`.
 */
export class ReadyFlag {
  private ready = false;

  isReady(): boolean {
    return this.ready;
  }

  markAsReady(): void {
    this.ready = true;
  }
}
