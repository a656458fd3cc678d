import { execFile, spawn } from "child_process";
import { createInterface } from "readline";
import { promisify } from "util";
import type { EncoderExit, IEncoder } from "../../domain/interfaces/iencoder";

const execFileAsync = promisify(execFile);

export interface FfmpegEncoderOptions {
  ffmpegPath: string;
  nvidiaSmiPath: string;
}

export class FfmpegEncoder implements IEncoder {
  constructor(private readonly options: FfmpegEncoderOptions) {}

  async isAvailable(): Promise<boolean> {
    try {
      await execFileAsync(this.options.ffmpegPath, ["-version"]);
      return true;
    } catch (error) {
      console.warn(`[FfmpegEncoder] ${this.options.ffmpegPath} is not available:`, error);
      return false;
    }
  }

  /**
   * An NVIDIA accelerator counts as present when `nvidia-smi` runs and exits 0.
   */
  async hasHardwareAccelerator(): Promise<boolean> {
    try {
      await execFileAsync(this.options.nvidiaSmiPath);
      return true;
    } catch {
      return false;
    }
  }

  encode(args: string[], onDiagnosticLine: (line: string) => void): Promise<EncoderExit> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.options.ffmpegPath, args, { stdio: ["ignore", "ignore", "pipe"] });

      // ffmpeg rewrites its stats line with \r; readline treats \r, \n and \r\n as line ends
      const lines = createInterface({ input: child.stderr, crlfDelay: Infinity });
      lines.on("line", (line) => {
        if (line.trim()) {
          onDiagnosticLine(line);
        }
      });

      child.once("error", (error) => {
        lines.close();
        reject(error);
      });
      child.once("close", (exitCode, signal) => {
        resolve({ exitCode, signal });
      });
    });
  }
}
