// Abstraction over the external encoder process (ffmpeg in production)

export interface EncoderExit {
  exitCode: number | null;
  signal: string | null;
}

export interface IEncoder {
  isAvailable(): Promise<boolean>;
  hasHardwareAccelerator(): Promise<boolean>;
  /**
   * Runs one encode and resolves when the process exits. Every diagnostic line is passed
   * to `onDiagnosticLine` in the order it was written.
   */
  encode(args: string[], onDiagnosticLine: (line: string) => void): Promise<EncoderExit>;
}
