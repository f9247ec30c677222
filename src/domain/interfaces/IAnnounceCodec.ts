import { Recognition } from '../entities';

export interface IAnnounceRecognizer {
  /**
   * Classifies a request
   * @throws MalformedAnnounceError when it looks like an announce but cannot be parsed
   */
  recognize(method: string, target: string): Recognition;
}

export interface IAnnounceRewriter {
  /**
   * Replaces the digits of the `uploaded` value and nothing else
   * @throws MalformedAnnounceError unless exactly one numeric `uploaded` is present
   */
  rewrite(target: string, uploaded: number): string;
}
