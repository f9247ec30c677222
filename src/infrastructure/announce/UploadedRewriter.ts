import { IAnnounceRewriter } from '../../domain/interfaces';
import { MalformedAnnounceError } from '../../domain/errors';
import { scanQuery } from './QueryScanner';

/**
 * Swaps the digits of the `uploaded` value in place.
 *
 * The query is never re-serialized: some trackers reject announces whose
 * escaping differs from what the client produced.
 */
export class UploadedRewriter implements IAnnounceRewriter {
  rewrite(target: string, uploaded: number): string {
    if (!Number.isSafeInteger(uploaded) || uploaded < 0) {
      throw new MalformedAnnounceError(`Cannot report uploaded=${uploaded}`);
    }

    const matches = scanQuery(target).filter((field) => field.key === 'uploaded');
    if (matches.length !== 1) {
      throw new MalformedAnnounceError(`Expected one uploaded parameter, found ${matches.length}`);
    }

    const [field] = matches;
    if (!/^\d+$/.test(field.value)) {
      throw new MalformedAnnounceError(`uploaded is not numeric: ${field.value.slice(0, 32)}`);
    }

    return field.valueSpan.replaceIn(target, String(uploaded));
  }
}
