import type pino from 'pino';
import {
  ArchivesSpaceError,
  AuthorizationFailure,
  BadRequestFailure,
  ConnectionFailure,
  InvalidResponseFailure,
  UnexpectedStatusFailure,
} from './errors';
import { logger as defaultLogger } from './logger';
import { buildRepositoryPayload, DEFAULT_SUBJECT } from './payloads';
import type {
  ClientOptions,
  ConnectionParams,
  ConnectionRecord,
  PostResult,
  Session,
  SubjectPayload,
} from './types';

export const SESSION_HEADER = 'X-ArchivesSpace-Session';

function isConnectionRecord(value: unknown): value is ConnectionRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  if (!('session' in value) || typeof value.session !== 'string') {
    return false;
  }
  if ('user' in value && value.user !== undefined) {
    const user = value.user;
    if (typeof user !== 'object' || user === null) return false;
    if ('username' in user && typeof user.username !== 'string') return false;
  }
  return true;
}

function toFormBody(payload: unknown): string | URLSearchParams {
  if (typeof payload === 'string') return payload;

  const fields = new URLSearchParams();
  if (typeof payload === 'object' && payload !== null) {
    for (const [key, value] of Object.entries(payload)) {
      fields.append(key, String(value));
    }
  }
  return fields;
}

function fail(error: ArchivesSpaceError): PostResult<never> {
  return { success: false, error };
}

/**
 * Client for the ArchivesSpace backend API.
 *
 * Authenticated calls take the Session returned by login() explicitly, so a
 * failed login cannot turn into unauthenticated requests later on.
 */
export class ArchivesSpaceClient {
  private readonly logger: pino.Logger;
  private readonly fetchFn: typeof fetch;
  private lastSession: Session | undefined;

  constructor(private readonly params: Readonly<ConnectionParams>, options: ClientOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Most recent successful login, if any. */
  get session(): Session | undefined {
    return this.lastSession;
  }

  get connection(): ConnectionRecord | undefined {
    return this.lastSession?.connection;
  }

  buildHost(): string {
    const { protocol, host, port } = this.params;
    return `${protocol}://${host}:${port}`;
  }

  /**
   * Start a session. Never throws: on failure the previous session state is
   * left untouched and the failure is returned.
   */
  async login(): Promise<PostResult<Session>> {
    const { username, password } = this.params;
    const path = `/users/${encodeURIComponent(username)}/login`;

    const result = await this.post(path, { password });
    if (!result.success) {
      this.logger.error({ username, kind: result.error.kind }, "Couldn't authenticate.");
      return result;
    }

    if (!isConnectionRecord(result.data)) {
      const error = new InvalidResponseFailure(
        'Login response has no session token',
        JSON.stringify(result.data)
      );
      this.logger.error({ path, username }, error.message);
      this.logger.error({ username, kind: error.kind }, "Couldn't authenticate.");
      return fail(error);
    }

    const session: Session = { token: result.data.session, connection: result.data };
    this.lastSession = session;
    this.logger.debug({ username }, 'Authenticated');
    return { success: true, data: session };
  }

  /**
   * POST to the backend. With a session the payload is sent as JSON text
   * together with the session header; without one it goes out as a form body,
   * which only the login endpoint accepts.
   */
  async post(path: string, payload: unknown, session?: Session): Promise<PostResult<unknown>> {
    const url = this.buildHost() + path;
    const init: RequestInit = session
      ? {
          method: 'POST',
          headers: { [SESSION_HEADER]: session.token, 'Content-Type': 'application/json' },
          body: JSON.stringify(payload),
        }
      : { method: 'POST', body: toFormBody(payload) };

    let response: Response;
    try {
      response = await this.fetchFn(url, init);
    } catch (err) {
      this.logger.error(
        { path, err },
        'Unable to connect to ArchivesSpace. Check the host information.'
      );
      return fail(new ConnectionFailure(url, err));
    }

    const { status } = response;
    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      this.logger.error({ path, status, err }, 'Response body could not be read');
      return fail(new InvalidResponseFailure('Response body could not be read', '', status));
    }

    switch (status) {
      case 200:
        return this.parseBody(path, body);
      case 403:
        this.logger.error({ path, status, body }, 'Forbidden -- check your credentials.');
        return fail(new AuthorizationFailure(body));
      case 400:
        this.logger.error({ path, status, body }, 'Bad Request');
        return fail(new BadRequestFailure(body));
      default:
        this.logger.error({ path, status, body }, `Unexpected status ${status}`);
        return fail(new UnexpectedStatusFailure(status, body));
    }
  }

  async createRepository(session: Session, code: string, name: string): Promise<PostResult<unknown>> {
    return this.post('/repositories', buildRepositoryPayload(code, name), session);
  }

  async createSubject(
    session: Session,
    subject: Readonly<SubjectPayload> = DEFAULT_SUBJECT
  ): Promise<PostResult<unknown>> {
    return this.post('/subjects', subject, session);
  }

  private parseBody(path: string, body: string): PostResult<unknown> {
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (err) {
      this.logger.error({ path, status: 200, body, err }, 'Response body is not valid JSON');
      return fail(new InvalidResponseFailure('Response body is not valid JSON', body));
    }
    return { success: true, data };
  }
}
