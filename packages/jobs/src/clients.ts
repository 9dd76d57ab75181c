import { ServiceError, errorMessage, sleep, type Sleep } from "@ytarchive/recovery";
import { logJob } from "./observability.js";

export interface VideoMetadata {
  videoId: string;
  title: string;
  [field: string]: unknown;
}

export interface PlaylistVideo {
  videoId: string;
  position: number;
  title: string;
  isAvailable: boolean;
}

export interface PlaylistMetadata {
  playlistId: string;
  title: string;
  videos: PlaylistVideo[];
}

export interface MetadataClient {
  fetchVideo(videoId: string, signal?: AbortSignal): Promise<VideoMetadata>;
  fetchPlaylist(playlistId: string, signal?: AbortSignal): Promise<PlaylistMetadata>;
}

export interface DownloadRequest {
  videoId: string;
  outputPath: string;
  quality: string;
  includeCaptions: boolean;
  captionLanguages: string[];
  resume: boolean;
}

export interface DownloadOutcome {
  filePath: string;
  fileSize?: number;
}

export interface DownloadClient {
  /** Resolves once the file is fully written. */
  download(request: DownloadRequest, signal?: AbortSignal): Promise<DownloadOutcome>;
}

export interface StoredVideo {
  videoId: string;
  filePath: string;
  fileSize?: number;
  quality: string;
}

export interface StorageClient {
  saveVideo(record: StoredVideo, signal?: AbortSignal): Promise<void>;
  saveMetadata(videoId: string, metadata: VideoMetadata, signal?: AbortSignal): Promise<void>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  fetch?: FetchLike;
}

/** Response envelope shared by the archive services. */
interface Envelope<T> {
  success?: boolean;
  data?: T;
  error?: string;
  detail?: string;
}

/** `Retry-After` as milliseconds; accepts delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1_000);
  const at = Date.parse(value);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

function parseEnvelope<T>(text: string): Envelope<T> {
  if (text.length === 0) return {};
  try {
    return JSON.parse(text) as Envelope<T>;
  } catch {
    return { detail: text.slice(0, 200) };
  }
}

function causeCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !(error.cause instanceof Error)) return undefined;
  const code = Reflect.get(error.cause, "code");
  return typeof code === "string" ? code : undefined;
}

abstract class ServiceHttpClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    protected readonly service: string,
    protected readonly baseUrl: string,
    options: HttpClientOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  protected async request<T>(method: string, path: string, body?: unknown, signal?: AbortSignal): Promise<T> {
    const payload = await this.send<T>(method, path, body, signal);
    if (payload.data === undefined) {
      throw new ServiceError(`${this.service} service returned no data for ${path}`, { service: this.service });
    }
    return payload.data;
  }

  /** Like `request`, for endpoints whose response carries no data. */
  protected async send<T>(method: string, path: string, body?: unknown, signal?: AbortSignal): Promise<Envelope<T>> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: body === undefined ? undefined : { "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ServiceError(`${this.service} service unreachable: ${err instanceof Error ? err.message : String(err)}`, {
        service: this.service,
        code: causeCode(err),
        cause: err,
      });
    }

    const payload = parseEnvelope<T>(await response.text());
    if (!response.ok || payload.success === false) {
      const detail = payload.error ?? payload.detail ?? response.statusText;
      throw new ServiceError(`${this.service} service error: ${response.status} - ${detail}`, {
        service: this.service,
        status: response.status,
        retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
      });
    }
    return payload;
  }
}

interface RawPlaylist {
  playlist_id?: string;
  title?: string;
  videos?: Array<{ video_id: string; position?: number; title?: string; is_available?: boolean }>;
}

export class HttpMetadataClient extends ServiceHttpClient implements MetadataClient {
  constructor(baseUrl = "http://localhost:8001", options: HttpClientOptions = {}) {
    super("metadata", baseUrl, options);
  }

  async fetchVideo(videoId: string, signal?: AbortSignal): Promise<VideoMetadata> {
    const data = await this.request<Record<string, unknown>>(
      "GET",
      `/api/v1/metadata/video/${encodeURIComponent(videoId)}`,
      undefined,
      signal,
    );
    const title = data.title;
    return { ...data, videoId, title: typeof title === "string" ? title : "" };
  }

  async fetchPlaylist(playlistId: string, signal?: AbortSignal): Promise<PlaylistMetadata> {
    const data = await this.request<RawPlaylist>(
      "GET",
      `/api/v1/metadata/playlist/${encodeURIComponent(playlistId)}`,
      undefined,
      signal,
    );
    return {
      playlistId: data.playlist_id ?? playlistId,
      title: data.title ?? "Unknown Playlist",
      videos: (data.videos ?? []).map((video, index) => ({
        videoId: video.video_id,
        position: video.position ?? index,
        title: video.title ?? "",
        isAvailable: video.is_available ?? true,
      })),
    };
  }
}

interface DownloadProgress {
  status: "pending" | "downloading" | "completed" | "failed" | "cancelled";
  error?: string;
  file_path?: string;
  file_size?: number;
}

export interface HttpDownloadClientOptions extends HttpClientOptions {
  pollIntervalMs?: number;
  sleep?: Sleep;
}

const CANCEL_TIMEOUT_MS = 5_000;

/** Starts a download task and polls its progress until it settles; aborting cancels the task. */
export class HttpDownloadClient extends ServiceHttpClient implements DownloadClient {
  private readonly pollIntervalMs: number;
  private readonly sleep: Sleep;

  constructor(baseUrl = "http://localhost:8002", options: HttpDownloadClientOptions = {}) {
    super("download", baseUrl, options);
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.sleep = options.sleep ?? sleep;
  }

  async download(request: DownloadRequest, signal?: AbortSignal): Promise<DownloadOutcome> {
    const task = await this.request<{ task_id: string }>(
      "POST",
      "/api/v1/download/video",
      {
        video_id: request.videoId,
        quality: request.quality,
        output_path: request.outputPath,
        include_captions: request.includeCaptions,
        caption_languages: request.captionLanguages,
        resume: request.resume,
      },
      signal,
    );

    try {
      return await this.poll(request, task.task_id, signal);
    } catch (err) {
      // the task would otherwise keep running next to the retry's new one
      if (signal?.aborted) await this.cancelTask(task.task_id);
      throw err;
    }
  }

  private async poll(request: DownloadRequest, taskId: string, signal?: AbortSignal): Promise<DownloadOutcome> {
    for (;;) {
      const progress = await this.request<DownloadProgress>(
        "GET",
        `/api/v1/download/progress/${encodeURIComponent(taskId)}`,
        undefined,
        signal,
      );
      switch (progress.status) {
        case "completed":
          return { filePath: progress.file_path ?? request.outputPath, fileSize: progress.file_size };
        case "failed":
          throw new ServiceError(`Download failed: ${progress.error ?? "Unknown download error"}`, { service: this.service });
        case "cancelled":
          throw new ServiceError("Download was cancelled by the download service", { service: this.service });
        default:
          await this.sleep(this.pollIntervalMs, signal);
      }
    }
  }

  /** Best-effort; a failure is logged and the caller's abort reason still propagates. */
  private async cancelTask(taskId: string): Promise<void> {
    try {
      await this.send<unknown>(
        "POST",
        `/api/v1/download/cancel/${encodeURIComponent(taskId)}`,
        undefined,
        AbortSignal.timeout(CANCEL_TIMEOUT_MS),
      );
    } catch (err) {
      logJob("warn", "could not cancel download task", { taskId, error: errorMessage(err) });
    }
  }
}

export class HttpStorageClient extends ServiceHttpClient implements StorageClient {
  constructor(baseUrl = "http://localhost:8003", options: HttpClientOptions = {}) {
    super("storage", baseUrl, options);
  }

  async saveVideo(record: StoredVideo, signal?: AbortSignal): Promise<void> {
    await this.send<unknown>(
      "POST",
      "/api/v1/storage/save/video",
      {
        video_id: record.videoId,
        file_path: record.filePath,
        file_size: record.fileSize ?? 0,
        format: "mp4",
        quality: record.quality,
      },
      signal,
    );
  }

  async saveMetadata(videoId: string, metadata: VideoMetadata, signal?: AbortSignal): Promise<void> {
    await this.send<unknown>("POST", "/api/v1/storage/save/metadata", { video_id: videoId, metadata }, signal);
  }
}
