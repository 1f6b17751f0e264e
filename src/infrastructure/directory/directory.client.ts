import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';

import { ExternalServiceError } from '@core/errors/external-service.error.js';
import type {
  DirectoryClient,
  DirectoryEntry,
  DirectoryKind,
} from '@core/interfaces/collaborators.types.js';

import { toExternalError } from '@infra/http/http.client.js';

import { createLogger } from '@utils/logger.js';

const log = createLogger('directory-client');

const idLike = z.union([z.string(), z.number()]).transform(String);

const DirectoryPayload = z
  .object({
    status: z.string().optional(),
    active: z.boolean().optional(),
    category_id: idLike.nullish(),
    department_id: idLike.nullish(),
  })
  .passthrough();

export interface DirectoryHttpOptions {
  requesterUrl: string;
  providerUrl: string;
  /** Let lookups through unverified when the directory is unreachable. Development only. */
  failOpen?: boolean;
}

export function parseDirectoryEntry(body: unknown): DirectoryEntry {
  const parsed = DirectoryPayload.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ExternalServiceError('directory', 'Directory returned an unreadable entry');
  }
  const { status, active, category_id, department_id } = parsed.data;
  return {
    exists: true,
    active: active ?? (status ? status.toUpperCase() === 'ACTIVE' : true),
    categoryId: category_id ?? department_id ?? null,
  };
}

export class HttpDirectoryClient implements DirectoryClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly opts: DirectoryHttpOptions,
  ) {}

  async lookup(kind: DirectoryKind, id: string): Promise<DirectoryEntry> {
    const base = kind === 'requester' ? this.opts.requesterUrl : this.opts.providerUrl;
    let res: AxiosResponse;
    try {
      res = await this.http.get(`${base}/${encodeURIComponent(id)}`);
      if (res.status >= 500) {
        throw new ExternalServiceError('directory', `Directory answered ${res.status} for ${kind}`);
      }
    } catch (err) {
      // only an unreachable or failing directory may be bypassed
      const failure = toExternalError('directory', err, `${kind} lookup failed`);
      if (this.opts.failOpen) {
        log.warn({ kind, id, reason: failure.message }, '[directory] unavailable, assuming active');
        return { exists: true, active: true, categoryId: null, assumed: true };
      }
      throw failure;
    }

    if (res.status === 404) return { exists: false, active: false, categoryId: null };
    if (res.status < 200 || res.status >= 300) {
      throw new ExternalServiceError('directory', `Directory answered ${res.status} for ${kind}`);
    }
    return parseDirectoryEntry(res.data);
  }
}
