/**
 * Single-assignment cell. The first `settle` wins; later calls are dropped and
 * report `false`, so a producer that outlives its consumer never blocks.
 */
export class OneShot<T> {
  readonly promise: Promise<T>
  private resolveFn: (value: T) => void = () => {}
  private settled = false

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolveFn = resolve
    })
  }

  settle(value: T): boolean {
    if (this.settled) return false
    this.settled = true
    this.resolveFn(value)
    return true
  }
}
