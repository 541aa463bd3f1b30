import { createHash } from 'crypto';
import { normalizeCacheState, validateCacheState } from '../../utils/io/localCache';
import type { WorkspaceHashes, WorkspaceSections, WorkspaceSnapshot } from './types';

export const WORKSPACE_VERSION = '1';

/**
 * SHA-256 of a section's JSON text, Base64 encoded.
 */
export function computeSectionHash(section: unknown): string {
  return createHash('sha256').update(JSON.stringify(section), 'utf8').digest('base64');
}

export function computeSectionHashes(sections: WorkspaceSections): WorkspaceHashes {
  return {
    budgetTransactionsHash: computeSectionHash(sections.budgetTransactions),
    projectionsHash: computeSectionHash(sections.projectedTransactions),
    localCacheStateHash: computeSectionHash(sections.localCacheState),
  };
}

export function buildWorkspaceSnapshot(sections: WorkspaceSections, lastModified: Date = new Date()): WorkspaceSnapshot {
  return {
    ...sections,
    ...computeSectionHashes(sections),
    version: WORKSPACE_VERSION,
    lastModified: lastModified.toISOString(),
  };
}

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

/**
 * Lists what is missing from a snapshot before it can be stored or restored. Accepts parsed
 * JSON, so a snapshot sent back by a client can be checked as it arrived.
 * @returns One message per problem; empty when the snapshot is complete
 */
export function validateWorkspaceSnapshot(snapshot: Record<string, unknown>): string[] {
  const problems: string[] = [];
  if (!Array.isArray(snapshot.budgetTransactions)) {
    problems.push('budgetTransactions is missing');
  }
  if (!Array.isArray(snapshot.projectedTransactions)) {
    problems.push('projectedTransactions is missing');
  }
  if (!validateCacheState(normalizeCacheState(snapshot.localCacheState))) {
    problems.push('localCacheState has no budget CSV path');
  }
  if (isBlank(snapshot.budgetTransactionsHash)) {
    problems.push('budgetTransactionsHash is missing');
  }
  if (isBlank(snapshot.projectionsHash)) {
    problems.push('projectionsHash is missing');
  }
  if (isBlank(snapshot.localCacheStateHash)) {
    problems.push('localCacheStateHash is missing');
  }
  if (isBlank(snapshot.version)) {
    problems.push('version is missing');
  }
  if (isBlank(snapshot.lastModified)) {
    problems.push('lastModified is missing');
  }
  return problems;
}

/**
 * True when every section still hashes to the value stored beside it.
 */
export function verifySectionHashes(snapshot: Record<string, unknown>): boolean {
  return (
    computeSectionHash(snapshot.budgetTransactions) === snapshot.budgetTransactionsHash &&
    computeSectionHash(snapshot.projectedTransactions) === snapshot.projectionsHash &&
    computeSectionHash(snapshot.localCacheState) === snapshot.localCacheStateHash
  );
}
