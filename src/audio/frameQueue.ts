// src/audio/frameQueue.ts
// Bounded FIFO that evicts its oldest entries when full.

export class BoundedFrameQueue<T> {
  private readonly maxFrames: number;
  private frames: T[] = [];
  private droppedTotal = 0;

  constructor(maxFrames: number) {
    this.maxFrames = Math.max(1, Math.floor(maxFrames));
  }

  /** Returns how many frames were evicted to make room. */
  public push(frame: T): number {
    this.frames.push(frame);
    let dropped = 0;
    while (this.frames.length > this.maxFrames) {
      this.frames.shift();
      dropped += 1;
    }
    this.droppedTotal += dropped;
    return dropped;
  }

  public shift(): T | undefined {
    return this.frames.shift();
  }

  public clear(): number {
    const cleared = this.frames.length;
    this.frames = [];
    return cleared;
  }

  public get length(): number {
    return this.frames.length;
  }

  public get dropped(): number {
    return this.droppedTotal;
  }
}
