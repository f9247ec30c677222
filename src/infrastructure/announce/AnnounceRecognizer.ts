import { IAnnounceRecognizer } from '../../domain/interfaces';
import { Recognition } from '../../domain/entities';
import { MalformedAnnounceError } from '../../domain/errors';
import { QueryField, percentDecodeBytes, scanQuery } from './QueryScanner';

const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Recognizes tracker announces: a GET carrying both `info_hash` and `uploaded`.
 * Anything else is plain traffic and passes through.
 */
export class AnnounceRecognizer implements IAnnounceRecognizer {
  recognize(method: string, target: string): Recognition {
    if (method.toUpperCase() !== 'GET') {
      return { kind: 'passthrough' };
    }

    const fields = scanQuery(target);
    const infoHashes = fields.filter((field) => field.key === 'info_hash');
    const uploadedFields = fields.filter((field) => field.key === 'uploaded');

    if (infoHashes.length === 0 || uploadedFields.length === 0) {
      return { kind: 'passthrough' };
    }

    if (infoHashes.length > 1) {
      throw new MalformedAnnounceError(`Expected one info_hash, found ${infoHashes.length}`);
    }
    if (uploadedFields.length > 1) {
      throw new MalformedAnnounceError(`Expected one uploaded, found ${uploadedFields.length}`);
    }

    const downloaded = findSingle(fields, 'downloaded');
    if (!downloaded) {
      throw new MalformedAnnounceError('Announce has no downloaded parameter');
    }
    const left = findSingle(fields, 'left');

    return {
      kind: 'announce',
      announce: {
        infoHash: decodeInfoHash(infoHashes[0].value),
        downloaded: parseCounter(downloaded),
        uploaded: parseCounter(uploadedFields[0]),
        left: left ? parseCounter(left) : null,
      },
    };
  }
}

function findSingle(fields: QueryField[], key: string): QueryField | undefined {
  const matches = fields.filter((field) => field.key === key);
  if (matches.length > 1) {
    throw new MalformedAnnounceError(`Expected at most one ${key}, found ${matches.length}`);
  }
  return matches[0];
}

function parseCounter(field: QueryField): number {
  const parsed = Number(field.value);
  if (!UNSIGNED_INTEGER.test(field.value) || !Number.isSafeInteger(parsed)) {
    throw new MalformedAnnounceError(`${field.key} is not an unsigned integer: ${field.value.slice(0, 32)}`);
  }
  return parsed;
}

function decodeInfoHash(raw: string): string {
  const bytes = percentDecodeBytes(raw);
  if (!bytes || bytes.length === 0) {
    throw new MalformedAnnounceError('info_hash is empty or badly escaped');
  }
  return bytes.toString('hex');
}
