/**
 * A single timer
 */
export class Timer {
  public timeMs?: number;
  private readonly startTime: number;
  private running = true;

  constructor(public readonly label: string, private readonly onStop?: (t: Timer) => void) {
    this.startTime = Date.now();
  }

  public stop() {
    if (!this.running) { return; }
    this.running = false;

    this.timeMs = Date.now() - this.startTime;
    this.onStop?.(this);
  }

  public humanTime() {
    if (this.timeMs === undefined) { return '???'; }
    return humanTime(this.timeMs / 1000);
  }
}

/**
 * Run an async block under a timer, stopping it whichever way the block ends
 */
export async function timed<A>(label: string, block: () => Promise<A>, onStop?: (t: Timer) => void): Promise<A> {
  const timer = new Timer(label, onStop);
  try {
    return await block();
  } finally {
    timer.stop();
  }
}

export function humanTime(time: number) {
  const parts = [];

  if (time > 60) {
    const mins = Math.floor(time / 60);
    parts.push(mins + 'm');
    time -= mins * 60;
  }
  parts.push(time.toFixed(1) + 's');

  return parts.join('');
}
