export { ArchivesSpaceClient, SESSION_HEADER } from './client';
export { loadClientConfig } from './config';
export {
  ArchivesSpaceError,
  AuthorizationFailure,
  BadRequestFailure,
  ConnectionFailure,
  InvalidResponseFailure,
  UnexpectedStatusFailure,
  unwrap,
} from './errors';
export type { FailureKind } from './errors';
export { logger, silentLogger } from './logger';
export { buildRepositoryPayload, DEFAULT_SUBJECT } from './payloads';
export type {
  ClientOptions,
  ConnectionParams,
  ConnectionRecord,
  PostResult,
  RepositoryPayload,
  Session,
  SubjectPayload,
  TermPayload,
} from './types';
