import { spawn } from 'child_process';

export class FFmpegWrapper {
  private ffmpegPath: string;
  private timeoutMs: number;

  constructor(ffmpegPath: string = 'ffmpeg', timeoutMs: number = 3600000) {
    this.ffmpegPath = ffmpegPath;
    this.timeoutMs = timeoutMs;
  }

  get path(): string {
    return this.ffmpegPath;
  }

  /** Runs ffmpeg and resolves with its stderr, where it reports everything useful. */
  async run(args: string[], description?: string): Promise<string> {
    if (description) {
      console.log(`FFmpeg: ${description}`);
    }

    return new Promise((resolve, reject) => {
      const child = spawn(this.ffmpegPath, ['-hide_banner', ...args], {
        stdio: ['ignore', 'pipe', 'pipe']
      });

      let stderr = '';

      child.stdout.on('data', () => {
        // output goes to files; stdout is drained so the pipe never fills
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      const timeout = setTimeout(() => {
        child.kill('SIGKILL');
        reject(new Error(`FFmpeg process timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      child.on('close', (code: number | null) => {
        clearTimeout(timeout);

        if (code === 0) {
          resolve(stderr);
        } else {
          reject(new Error(`FFmpeg process exited with code ${code}: ${stderr.slice(-2000)}`));
        }
      });

      child.on('error', (error: Error) => {
        clearTimeout(timeout);
        reject(new Error(`Failed to start FFmpeg process: ${error.message}`));
      });
    });
  }

  async checkFFmpegAvailable(): Promise<boolean> {
    try {
      await this.run(['-version']);
      return true;
    } catch {
      return false;
    }
  }
}
