export { BlobRecord, IBlobRecord } from './BlobRecord';
