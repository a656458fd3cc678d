import { open, stat } from "fs/promises";
import type { OAuth2Client } from "google-auth-library";
import { UploadTransportFailureError } from "../../domain/errors/job.errors";
import type { IVideoPlatform, VideoMetadata, VideoUploadRequest } from "../../domain/interfaces/ivideo.platform";

export const YOUTUBE_RESUMABLE_UPLOAD_URL = "https://www.googleapis.com/upload/youtube/v3/videos";

// Chunks other than the last must be a multiple of 256 KiB
export const UPLOAD_CHUNK_GRANULARITY = 256 * 1024;
export const DEFAULT_UPLOAD_CHUNK_SIZE = 8 * 1024 * 1024;

export interface UploadHttpRequest {
  url: string;
  method: "POST" | "PUT";
  headers: Record<string, string>;
  body?: Buffer | string;
}

export interface UploadHttpResponse {
  status: number;
  headers: Record<string, string>; // lower-case names
  data: unknown;
}

export type UploadTransport = (request: UploadHttpRequest) => Promise<UploadHttpResponse>;

export interface YouTubeVideoPlatformOptions {
  chunkSize?: number;
  transportFactory?: (session: OAuth2Client) => UploadTransport;
}

/**
 * Sends requests through the client's authorized gaxios instance. 308 ("resume incomplete")
 * is a normal answer in the resumable protocol, so it is not treated as an error.
 */
export function createGaxiosTransport(client: OAuth2Client): UploadTransport {
  return async (request) => {
    const response = await client.request<unknown>({
      url: request.url,
      method: request.method,
      headers: request.headers,
      data: request.body,
      validateStatus: (status) => (status >= 200 && status < 300) || status === 308,
    });

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(response.headers ?? {})) {
      if (typeof value === "string") {
        headers[name.toLowerCase()] = value;
      }
    }
    return { status: response.status, headers, data: response.data };
  };
}

export function normalizeChunkSize(bytes: number): number {
  const chunks = Math.max(1, Math.floor(bytes / UPLOAD_CHUNK_GRANULARITY));
  return chunks * UPLOAD_CHUNK_GRANULARITY;
}

export function buildVideoResource(metadata: VideoMetadata) {
  return {
    snippet: {
      title: metadata.title,
      description: metadata.description,
      tags: metadata.tags,
      categoryId: metadata.categoryId,
    },
    status: {
      privacyStatus: metadata.privacyStatus,
      selfDeclaredMadeForKids: metadata.madeForKids,
    },
  };
}

/**
 * Number of bytes the server holds, from a `Range: bytes=0-N` header. No header means none.
 */
export function parseCommittedBytes(range: string | undefined): number {
  if (!range) {
    return 0;
  }
  const match = /bytes=0-(\d+)/.exec(range);
  return match ? Number(match[1]) + 1 : 0;
}

function extractVideoId(data: unknown): string | null {
  if (typeof data === "object" && data !== null && "id" in data && typeof data.id === "string" && data.id) {
    return data.id;
  }
  return null;
}

export class YouTubeVideoPlatform implements IVideoPlatform<OAuth2Client> {
  private readonly chunkSize: number;
  private readonly transportFactory: (session: OAuth2Client) => UploadTransport;

  constructor(options: YouTubeVideoPlatformOptions = {}) {
    this.chunkSize = normalizeChunkSize(options.chunkSize ?? DEFAULT_UPLOAD_CHUNK_SIZE);
    this.transportFactory = options.transportFactory ?? createGaxiosTransport;
  }

  async uploadVideo(request: VideoUploadRequest<OAuth2Client>): Promise<string> {
    const transport = this.transportFactory(request.session);
    const { size } = await stat(request.filePath);
    if (size === 0) {
      throw new UploadTransportFailureError(`Rendered file ${request.filePath} is empty`);
    }

    const sessionUrl = await this.startSession(transport, request.metadata, size);
    const handle = await open(request.filePath, "r");

    try {
      let offset = 0;
      while (offset < size) {
        const length = Math.min(this.chunkSize, size - offset);
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await handle.read(buffer, 0, length, offset);
        if (bytesRead === 0) {
          throw new UploadTransportFailureError(`Unexpected end of ${request.filePath} at byte ${offset}`);
        }

        const response = await transport({
          url: sessionUrl,
          method: "PUT",
          headers: {
            "Content-Length": String(bytesRead),
            "Content-Range": `bytes ${offset}-${offset + bytesRead - 1}/${size}`,
          },
          body: buffer.subarray(0, bytesRead),
        });

        if (response.status === 200 || response.status === 201) {
          request.onProgress?.(1);
          const videoId = extractVideoId(response.data);
          if (!videoId) {
            throw new UploadTransportFailureError("Upload completed but the response carried no video id");
          }
          return videoId;
        }

        if (response.status !== 308) {
          throw new UploadTransportFailureError(`Chunk upload rejected with HTTP ${response.status}`);
        }

        const committed = parseCommittedBytes(response.headers["range"]);
        if (committed <= offset) {
          throw new UploadTransportFailureError(`Server committed no bytes past offset ${offset}`);
        }
        offset = committed;
        request.onProgress?.(offset / size);
      }
    } finally {
      await handle.close();
    }

    throw new UploadTransportFailureError("All bytes were sent but the upload was never acknowledged as complete");
  }

  private async startSession(transport: UploadTransport, metadata: VideoMetadata, size: number): Promise<string> {
    const response = await transport({
      url: `${YOUTUBE_RESUMABLE_UPLOAD_URL}?uploadType=resumable&part=snippet,status`,
      method: "POST",
      headers: {
        "Content-Type": "application/json; charset=UTF-8",
        "X-Upload-Content-Type": "video/*",
        "X-Upload-Content-Length": String(size),
      },
      body: JSON.stringify(buildVideoResource(metadata)),
    });

    if (response.status !== 200) {
      throw new UploadTransportFailureError(`Upload session could not be started (HTTP ${response.status})`);
    }
    const location = response.headers["location"];
    if (!location) {
      throw new UploadTransportFailureError("Upload session response had no Location header");
    }
    return location;
  }
}
