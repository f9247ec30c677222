import { TextSpan } from '../../domain/value-objects';

/**
 * One `key=value` pair of a query string, with the value's position in the
 * full request target
 */
export interface QueryField {
  key: string;
  value: string;
  valueSpan: TextSpan;
}

/**
 * Splits the query part of a request target into fields without decoding
 * or normalising anything. Empty segments (`a=1&&b=2`) are skipped.
 */
export function scanQuery(target: string): QueryField[] {
  const queryStart = target.indexOf('?');
  if (queryStart === -1) {
    return [];
  }

  const fragmentStart = target.indexOf('#', queryStart);
  const queryEnd = fragmentStart === -1 ? target.length : fragmentStart;
  const fields: QueryField[] = [];

  let segmentStart = queryStart + 1;
  while (segmentStart <= queryEnd) {
    const ampersand = target.indexOf('&', segmentStart);
    const segmentEnd = ampersand === -1 || ampersand > queryEnd ? queryEnd : ampersand;

    if (segmentEnd > segmentStart) {
      const equals = target.indexOf('=', segmentStart);
      const hasValue = equals !== -1 && equals < segmentEnd;
      const keyEnd = hasValue ? equals : segmentEnd;
      const valueSpan = new TextSpan(hasValue ? equals + 1 : segmentEnd, segmentEnd);

      fields.push({
        key: target.slice(segmentStart, keyEnd),
        value: valueSpan.sliceOf(target),
        valueSpan,
      });
    }

    segmentStart = segmentEnd + 1;
  }

  return fields;
}

/**
 * Decodes %XX escapes into raw bytes; other characters map to their code unit
 * @returns null when an escape is truncated or not hexadecimal
 */
export function percentDecodeBytes(value: string): Buffer | null {
  const bytes: number[] = [];

  for (let i = 0; i < value.length; i++) {
    const ch = value.charCodeAt(i);
    if (ch !== 0x25) {
      bytes.push(ch & 0xff);
      continue;
    }
    const hex = value.slice(i + 1, i + 3);
    if (!/^[0-9a-fA-F]{2}$/.test(hex)) {
      return null;
    }
    bytes.push(parseInt(hex, 16));
    i += 2;
  }

  return Buffer.from(bytes);
}
