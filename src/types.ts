import type pino from 'pino';
import type { ArchivesSpaceError } from './errors';

export interface ConnectionParams {
  protocol: string;
  host: string;
  port: string | number;
  username: string;
  password: string;
}

export interface ClientOptions {
  logger?: pino.Logger;
  fetch?: typeof fetch;
}

/**
 * Raw body of a successful login, kept as the service sent it.
 */
export interface ConnectionRecord extends Record<string, unknown> {
  session: string;
  user?: { username?: string } & Record<string, unknown>;
}

export interface Session {
  readonly token: string;
  readonly connection: ConnectionRecord;
}

export type PostResult<T> =
  | { success: true; data: T }
  | { success: false; error: ArchivesSpaceError };

export interface RepositoryPayload {
  jsonmodel_type: 'repository';
  repo_code: string;
  name: string;
}

export interface TermPayload {
  readonly jsonmodel_type: 'term';
  readonly term: string;
  readonly term_type: string;
  readonly vocabulary: string;
}

export interface SubjectPayload {
  jsonmodel_type: 'subject';
  external_ids: readonly unknown[];
  publish: boolean;
  used_within_repositories: readonly string[];
  used_within_published_repositories: readonly string[];
  terms: readonly TermPayload[];
  external_documents: readonly unknown[];
  vocabulary: string;
  authority_id: string;
  scope_note: string;
  source: string;
}
