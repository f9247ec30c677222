/**
 * Best-effort check of a JSON release feed at startup.
 * Never throws and never blocks proxying.
 */

import { ILogger } from '../../domain/interfaces';

export interface UpdateCheckResult {
  updateAvailable: boolean;
  currentVersion: string;
  latestVersion: string | null;
}

type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Compare semantic versions
 * Returns true if latestVersion is newer than currentVersion
 */
export function isNewerVersion(currentVersion: string, latestVersion: string): boolean {
  const current = currentVersion.split('.').map((part) => parseInt(part, 10));
  const latest = latestVersion.split('.').map((part) => parseInt(part, 10));

  for (let i = 0; i < 3; i++) {
    const c = current[i] || 0;
    const l = latest[i] || 0;
    if (l > c) return true;
    if (l < c) return false;
  }

  return false;
}

/**
 * Pulls a version out of `{ "version": "1.2.3" }` or a release object with `tag_name: "v1.2.3"`
 */
export function extractVersion(body: unknown): string | null {
  if (typeof body !== 'object' || body === null) {
    return null;
  }
  const raw = 'version' in body && typeof body.version === 'string'
    ? body.version
    : 'tag_name' in body ? body.tag_name : undefined;
  if (typeof raw !== 'string' || raw.trim() === '') {
    return null;
  }
  return raw.trim().replace(/^v/i, '');
}

export class UpdateChecker {
  constructor(
    private feedUrl: string | undefined,
    private currentVersion: string,
    private logger: ILogger,
    private fetchImpl: FetchLike = fetch,
    private timeoutMs: number = DEFAULT_TIMEOUT_MS
  ) { }

  async check(): Promise<UpdateCheckResult> {
    const result: UpdateCheckResult = {
      updateAvailable: false,
      currentVersion: this.currentVersion,
      latestVersion: null,
    };

    if (!this.feedUrl) {
      return result;
    }

    try {
      const response = await this.fetchImpl(this.feedUrl, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!response.ok) {
        throw new Error(`Release feed answered ${response.status}`);
      }

      const latestVersion = extractVersion(await response.json());
      if (!latestVersion) {
        throw new Error('Release feed has no version');
      }

      result.latestVersion = latestVersion;
      result.updateAvailable = isNewerVersion(this.currentVersion, latestVersion);
      if (result.updateAvailable) {
        this.logger.info(`Update available: ${this.currentVersion} -> ${latestVersion}`);
      }
    } catch (error) {
      this.logger.debug(`Update check skipped: ${error instanceof Error ? error.message : String(error)}`);
    }

    return result;
  }
}
