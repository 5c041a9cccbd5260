export { withAbort } from './fs-helpers/abort.js';
export { atomicWriteFile } from './fs-helpers/atomic-write.js';
export type { AtomicWriteOptions } from './fs-helpers/atomic-write.js';
export { decodeUtf8Strict } from './fs-helpers/utf8.js';
