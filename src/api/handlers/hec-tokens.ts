import type { Request, Response } from 'express';
import type { ResourceStore } from '../../services/resource-store.js';
import type { HecTokenSummary } from '../../types/api.js';
import { TOKEN_SECRET_NAME } from '../../types/resources.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface HecTokenDeps {
  store: ResourceStore;
}

/**
 * GET /hectokens[?namespace=ns]
 *
 * Lists token records with their lifecycle state. Only reports whether the
 * token secret exists; its contents are never read into the response.
 */
export function handleHecTokenList(deps: HecTokenDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    const namespace = typeof req.query.namespace === 'string' && req.query.namespace !== ''
      ? req.query.namespace
      : undefined;

    try {
      const [tokens, secrets] = await Promise.all([
        deps.store.list('HecToken', namespace),
        deps.store.list('Secret', namespace),
      ]);
      const namespacesWithSecret = new Set(
        secrets.filter((secret) => secret.metadata.name === TOKEN_SECRET_NAME).map((secret) => secret.metadata.namespace),
      );

      const summaries: HecTokenSummary[] = tokens.map((token) => ({
        namespace: token.metadata.namespace,
        name: token.metadata.name,
        tokenName: token.spec.name,
        defaultIndex: token.spec.defaultIndex ?? '',
        allowedIndexes: token.spec.allowedIndexes ?? [],
        createdAt: token.metadata.creationTimestamp ?? null,
        deleting: token.metadata.deletionTimestamp !== undefined,
        hasSecret: namespacesWithSecret.has(token.metadata.namespace),
      }));
      sendOk(res, { tokens: summaries });
    } catch (err) {
      const { status, message } = mapError(err);
      sendError(res, message, status);
    }
  };
}
