import type { AuthUnavailableError, Result } from "../errors/job.errors";

export type PrivacyStatus = "private" | "unlisted" | "public";

export interface VideoMetadata {
  title: string;
  description: string;
  tags: string[];
  categoryId: string;
  privacyStatus: PrivacyStatus;
  madeForKids: boolean;
}

export interface VideoUploadRequest<TSession> {
  session: TSession;
  filePath: string;
  metadata: VideoMetadata;
  onProgress?: (fraction: number) => void; // called after every acknowledged chunk
}

export interface IVideoPlatform<TSession> {
  /** Uploads the file and resolves with the platform-issued video id. Rejects on any failure. */
  uploadVideo(request: VideoUploadRequest<TSession>): Promise<string>;
}

export interface ICredentialProvider<TSession> {
  getSession(): Promise<Result<TSession, AuthUnavailableError>>;
}
