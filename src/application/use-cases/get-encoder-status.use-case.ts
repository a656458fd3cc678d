import type { IEncoder } from "../../domain/interfaces/iencoder";
import { selectVideoCodec } from "../../infrastructure/ffmpeg/render.command";
import type { RenderQueue } from "../services/render.queue";

export interface EncoderStatus {
  ffmpegAvailable: boolean;
  hardwareAccelerator: boolean;
  videoCodec: string | null; // null when ffmpeg is missing
  encoderLabel: string | null;
  activeRenders: number;
  queuedRenders: number;
}

export class GetEncoderStatusUseCase {
  constructor(
    private encoder: IEncoder,
    private renderQueue: RenderQueue
  ) {}

  async execute(): Promise<EncoderStatus> {
    const ffmpegAvailable = await this.encoder.isAvailable();
    const hardwareAccelerator = await this.encoder.hasHardwareAccelerator();
    const codec = ffmpegAvailable ? selectVideoCodec(hardwareAccelerator) : null;

    return {
      ffmpegAvailable,
      hardwareAccelerator,
      videoCodec: codec ? codec.codec : null,
      encoderLabel: codec ? codec.label : null,
      activeRenders: this.renderQueue.activeCount,
      queuedRenders: this.renderQueue.pendingCount,
    };
  }
}
