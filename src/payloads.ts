import type { RepositoryPayload, SubjectPayload, TermPayload } from './types';

export function buildRepositoryPayload(code: string, name: string): RepositoryPayload {
  return { jsonmodel_type: 'repository', repo_code: code, name };
}

const DEFAULT_TERM = Object.freeze<TermPayload>({
  jsonmodel_type: 'term',
  term: 'Term 132',
  term_type: 'geographic',
  vocabulary: '/vocabularies/156',
});

// Sample subject record sent by createSubject when the caller passes none.
// Frozen all the way down, since every later call shares it.
export const DEFAULT_SUBJECT: Readonly<SubjectPayload> = Object.freeze<SubjectPayload>({
  jsonmodel_type: 'subject',
  external_ids: Object.freeze<readonly unknown[]>([]),
  publish: true,
  used_within_repositories: Object.freeze<readonly string[]>([]),
  used_within_published_repositories: Object.freeze<readonly string[]>([]),
  terms: Object.freeze<readonly TermPayload[]>([DEFAULT_TERM]),
  external_documents: Object.freeze<readonly unknown[]>([]),
  vocabulary: '/vocabularies/157',
  authority_id: 'http://www.example-596.com',
  scope_note: 'M911GA46',
  source: 'gmgpc',
});
