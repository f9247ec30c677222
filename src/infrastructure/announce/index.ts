export { AnnounceRecognizer } from './AnnounceRecognizer';
export { UploadedRewriter } from './UploadedRewriter';
export { scanQuery, percentDecodeBytes } from './QueryScanner';
export type { QueryField } from './QueryScanner';
