import { PoolClient } from 'pg';
import { MatchCandidate, StocktakeLine, VoiceCommand } from '../types/stocktake.types';
import {
     AmbiguousItemError,
     InvalidQuantityError,
     NoMatchError,
     UnsupportedVoiceActionError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { roundTo } from '../utils/math';
import { LineWriteResult, StocktakeService } from './stocktake-service';

export interface VoiceMatchOptions {
     /** Lowest score a candidate may have and still be chosen. */
     minScore: number;
     /** Candidates this close to the top score make the match ambiguous. */
     ambiguityMargin: number;
}

export const DEFAULT_VOICE_MATCH_OPTIONS: VoiceMatchOptions = {
     minScore: 0.55,
     ambiguityMargin: 0.05,
};

function scoreFromEnv(value: string | undefined, fallback: number): number {
     const parsed = parseFloat(value || '');
     return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1 ? parsed : fallback;
}

export function voiceMatchOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): VoiceMatchOptions {
     return {
          minScore: scoreFromEnv(env.VOICE_MIN_MATCH_SCORE, DEFAULT_VOICE_MATCH_OPTIONS.minScore),
          ambiguityMargin: scoreFromEnv(
               env.VOICE_AMBIGUITY_MARGIN,
               DEFAULT_VOICE_MATCH_OPTIONS.ambiguityMargin
          ),
     };
}

export interface VoiceCountResult extends LineWriteResult {
     matchedItem: MatchCandidate & { sku: string };
}

/**
 * Turns a parsed voice command into a count. Speech parsing and fuzzy
 * scoring happen upstream; this only picks a line and forwards the numbers.
 */
export class VoiceCommandAdapter {
     constructor(
          private readonly stocktakeService: StocktakeService,
          private readonly options: VoiceMatchOptions = DEFAULT_VOICE_MATCH_OPTIONS
     ) {}

     async applyCommand(
          client: PoolClient,
          stocktakeId: number,
          command: VoiceCommand,
          candidates: MatchCandidate[]
     ): Promise<VoiceCountResult> {
          const action = command.action.trim().toLowerCase();
          if (action !== 'count') {
               throw new UnsupportedVoiceActionError(command.action);
          }
          if (command.fullUnits === null && command.partialUnits === null) {
               throw new InvalidQuantityError(
                    `Voice command for "${command.itemIdentifier}" carries no quantity`
               );
          }

          const lines = await this.stocktakeService.getLines(client, stocktakeId);
          const { line, candidate } = this.matchLine(command.itemIdentifier, lines, candidates);

          logger.info(
               {
                    stocktakeId,
                    itemIdentifier: command.itemIdentifier,
                    sku: line.item.sku,
                    score: candidate.score,
               },
               'Voice command matched'
          );

          const result = await this.stocktakeService.recordCount(client, line.id, {
               fullUnits: command.fullUnits ?? 0,
               partialUnits: command.partialUnits ?? 0,
          });
          return { ...result, matchedItem: { ...candidate, sku: line.item.sku } };
     }

     matchLine(
          itemIdentifier: string,
          lines: StocktakeLine[],
          candidates: MatchCandidate[]
     ): { line: StocktakeLine; candidate: MatchCandidate } {
          const linesByItem = new Map(lines.map((line) => [line.item.id, line]));

          // best score per item, restricted to items on this stocktake
          const best = new Map<number, MatchCandidate>();
          for (const candidate of candidates) {
               if (!linesByItem.has(candidate.itemId) || !Number.isFinite(candidate.score)) {
                    continue;
               }
               const seen = best.get(candidate.itemId);
               if (!seen || candidate.score > seen.score) {
                    best.set(candidate.itemId, candidate);
               }
          }

          const ranked = [...best.values()].sort((a, b) => b.score - a.score);
          const top = ranked[0];
          if (!top || top.score < this.options.minScore) {
               throw new NoMatchError(itemIdentifier);
          }

          const contenders = ranked.filter(
               (candidate) =>
                    candidate.score >= this.options.minScore &&
                    roundTo(top.score - candidate.score, 6) <= this.options.ambiguityMargin
          );
          if (contenders.length > 1) {
               throw new AmbiguousItemError(itemIdentifier, contenders);
          }

          const line = linesByItem.get(top.itemId);
          if (!line) {
               throw new NoMatchError(itemIdentifier);
          }
          return { line, candidate: top };
     }
}
