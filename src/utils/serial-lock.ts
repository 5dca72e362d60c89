/**
 * Promise-chain mutex. Critical sections passed to `runExclusive` run one at a
 * time in call order, including ones that await internally. A section that
 * throws rejects its own caller only; the chain keeps going.
 */
export class SerialLock {
  private tail: Promise<unknown> = Promise.resolve();

  runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(section);
    // Successors wait for settlement, not success
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
