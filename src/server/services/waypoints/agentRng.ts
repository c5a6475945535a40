/**
 * Per-agent deterministic randomness.
 *
 * The generator for an agent depends only on (global seed, agent id,
 * scenario key), never on what other agents drew, so any agent's sequence
 * can be reproduced in isolation.
 */

import { createHash } from 'crypto';
import seedrandom from 'seedrandom';

export type RandomSource = () => number;

/**
 * Stable seed material for one agent: a SHA-256 hex digest of the tuple.
 */
export function deriveAgentSeed(globalSeed: number, agentId: number, scenarioKey: string): string {
  return createHash('sha256')
    .update(JSON.stringify([globalSeed, agentId, scenarioKey]))
    .digest('hex');
}

export function createAgentRng(globalSeed: number, agentId: number, scenarioKey: string): RandomSource {
  return seedrandom(deriveAgentSeed(globalSeed, agentId, scenarioKey));
}

/**
 * Draw `count` distinct items without replacement, in draw order.
 * Partial Fisher-Yates over a copy; the input is not modified.
 */
export function sampleWithoutReplacement<T>(items: ReadonlyArray<T>, count: number, random: RandomSource): T[] {
  const pool = [...items];
  const take = Math.min(count, pool.length);
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}
