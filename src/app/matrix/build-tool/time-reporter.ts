import { writeJsonFile } from "../../../core/utils.js";

/** Collects compile times of successful Xcode builds, keyed `<target>.compile_time`. */
export class TimeReporter {
  private readonly times: Record<string, number> = {};

  constructor(readonly filePath: string) {}

  update(target: string, elapsedSeconds: number): void {
    this.times[`${target}.compile_time`] = elapsedSeconds;
  }

  snapshot(): Record<string, number> {
    return { ...this.times };
  }

  async write(): Promise<void> {
    if (Object.keys(this.times).length === 0) return;
    await writeJsonFile(this.filePath, this.times);
  }
}
