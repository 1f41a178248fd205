export * from './services/plagiarism';
export * from './types/corpus.types';
export { AppError } from './utils/app-error';
export type { AppErrorCode } from './utils/app-error';
export type { SerializedResult, CorpusStoreOptionsInput } from './schemas/corpus.schemas';
