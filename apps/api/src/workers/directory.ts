import { WorkerUnavailableError } from '../errors.js';
import { WORKER_KINDS, type WorkerKind, type WorkerRequest } from './contracts.js';

export interface WorkerHandle {
  /** Resolves once the worker accepted the request; the reply arrives later. */
  send(request: WorkerRequest): Promise<void>;
}

export interface WorkerDirectory {
  resolve(kind: WorkerKind): WorkerHandle | undefined;
}

async function postJson(url: string, body: unknown, kind: WorkerKind): Promise<void> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json'
      },
      body: JSON.stringify(body)
    });
  } catch (err) {
    throw new WorkerUnavailableError(kind, err instanceof Error ? err.message : String(err));
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new WorkerUnavailableError(kind, `request failed (${res.status}): ${text}`);
  }
}

/**
 * Directory of workers reachable over HTTP. Each request is POSTed to the
 * worker's endpoint together with the address it should post its reply to.
 */
export function createHttpWorkerDirectory(params: {
  endpoints: Partial<Record<WorkerKind, string>>;
  replyTo: string;
}): WorkerDirectory {
  const handles = new Map<WorkerKind, WorkerHandle>();

  for (const kind of WORKER_KINDS) {
    const url = params.endpoints[kind];
    if (!url) continue;
    handles.set(kind, {
      send: (request) => postJson(url, { ...request, replyTo: params.replyTo }, kind)
    });
  }

  return {
    resolve: (kind) => handles.get(kind)
  };
}
