import { errorMessage } from '../logger.js';
import type { Page, PlaylistEntry, RemoteCollection, RemoteUser } from '../types.js';
import { decodeCollection, decodePlaylistPage, decodeUser, isRecord } from './normalize.js';
import { DEFAULT_RETRY_AFTER_SECONDS, parseRetryAfterSeconds } from './retry-after.js';
import { failed, RemoteFailure, RemoteResult, succeeded } from './retry.js';

/** Read side: the paginated-collection endpoint plus collection metadata. */
export interface PlaylistReader {
  getPlaylistPage(playlistId: string, offset: number, limit: number): Promise<RemoteResult<Page<PlaylistEntry>>>;
  getPlaylistName(playlistId: string): Promise<RemoteResult<string>>;
}

/** Write side: the batched-write endpoint plus what is needed to create targets. */
export interface PlaylistWriter {
  getCurrentUser(): Promise<RemoteResult<RemoteUser>>;
  createPlaylist(userId: string, input: CreatePlaylistInput): Promise<RemoteResult<RemoteCollection>>;
  addItems(playlistId: string, ids: string[]): Promise<RemoteResult<void>>;
}

export interface CreatePlaylistInput {
  name: string;
  description?: string;
  public?: boolean;
}

export interface PlaylistApiOptions {
  baseUrl: string;
  accessToken: string;
  timeoutMs?: number;
  defaultRetryAfterSeconds?: number;
  fetchImpl?: typeof fetch;
}

type Decoder<T> = (value: unknown) => T | undefined;

export function toTrackUri(id: string): string {
  return id.startsWith('spotify:') ? id : `spotify:track:${id}`;
}

function describeErrorBody(body: unknown, fallback: string): string {
  if (isRecord(body)) {
    const error = body.error;
    if (isRecord(error) && typeof error.message === 'string') return error.message;
    if (typeof error === 'string') return error;
    if (typeof body.error_description === 'string') return body.error_description;
  }
  return fallback;
}

/**
 * Maps a non-2xx response to a failure class: 429 is rate-limited, 5xx is
 * transient, every other status is terminal.
 */
export function classifyHttpFailure(
  status: number,
  message: string,
  retryAfterHeader: string | null,
  defaultRetryAfterSeconds: number = DEFAULT_RETRY_AFTER_SECONDS
): RemoteFailure {
  if (status === 429) {
    return {
      kind: 'rate-limited',
      status,
      message,
      retryAfterSeconds: parseRetryAfterSeconds(retryAfterHeader, defaultRetryAfterSeconds),
    };
  }
  if (status >= 500) {
    return { kind: 'transient', status, message };
  }
  return { kind: 'terminal', status, message };
}

export class PlaylistApiClient implements PlaylistReader, PlaylistWriter {
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly timeoutMs: number;
  private readonly defaultRetryAfterSeconds: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: PlaylistApiOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.accessToken = options.accessToken;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.defaultRetryAfterSeconds = options.defaultRetryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  getPlaylistPage(playlistId: string, offset: number, limit: number): Promise<RemoteResult<Page<PlaylistEntry>>> {
    const query = new URLSearchParams({ offset: String(offset), limit: String(limit) });
    return this.request('GET', `/playlists/${encodeURIComponent(playlistId)}/tracks?${query}`, decodePlaylistPage);
  }

  getPlaylistName(playlistId: string): Promise<RemoteResult<string>> {
    return this.request('GET', `/playlists/${encodeURIComponent(playlistId)}?fields=name`, (body) =>
      isRecord(body) && typeof body.name === 'string' ? body.name : undefined
    );
  }

  getCurrentUser(): Promise<RemoteResult<RemoteUser>> {
    return this.request('GET', '/me', decodeUser);
  }

  createPlaylist(userId: string, input: CreatePlaylistInput): Promise<RemoteResult<RemoteCollection>> {
    return this.request('POST', `/users/${encodeURIComponent(userId)}/playlists`, decodeCollection, {
      name: input.name,
      public: input.public ?? false,
      description: input.description ?? '',
    });
  }

  async addItems(playlistId: string, ids: string[]): Promise<RemoteResult<void>> {
    const sent = await this.send('POST', `/playlists/${encodeURIComponent(playlistId)}/tracks`, {
      uris: ids.map(toTrackUri),
    });
    if (!sent.ok) return sent;
    await sent.value.body?.cancel();
    return succeeded(undefined);
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    decode: Decoder<T>,
    body?: unknown
  ): Promise<RemoteResult<T>> {
    const sent = await this.send(method, path, body);
    if (!sent.ok) return sent;
    const response = sent.value;

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      return failed({ kind: 'transient', status: response.status, message: `${method} ${path}: ${errorMessage(error)}` });
    }

    const decoded = decode(payload);
    if (decoded === undefined) {
      return failed({
        kind: 'transient',
        status: response.status,
        message: `${method} ${path}: unexpected response shape`,
      });
    }
    return succeeded(decoded);
  }

  private async send(method: 'GET' | 'POST', path: string, body?: unknown): Promise<RemoteResult<Response>> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return failed({ kind: 'transient', message: `${method} ${path}: ${errorMessage(error)}` });
    }

    if (response.ok) {
      return succeeded(response);
    }

    const errorBody: unknown = await response.json().catch(() => undefined);
    const message = describeErrorBody(errorBody, `Request failed: ${response.status} ${response.statusText}`.trim());
    return failed(
      classifyHttpFailure(
        response.status,
        `${method} ${path}: ${message}`,
        response.headers.get('Retry-After'),
        this.defaultRetryAfterSeconds
      )
    );
  }
}
