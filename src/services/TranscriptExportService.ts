// src/services/TranscriptExportService.ts
import * as path from 'path';
import { CaseRecord, ConversationRecord, DiscussionSet, Turn } from '../types/transcript.types';
import { FileHelpers } from '../utils/file-helpers';
import logger from '../utils/logger';

export type ScriptFormat = 'script' | 'jsonl';

export class TranscriptExportService {
  /**
   * {label: text} object for one turn
   */
  turnToObject(turn: Turn): Record<string, string> {
    return { [turn.label]: turn.text };
  }

  toConversationRecord(record: CaseRecord): ConversationRecord {
    return {
      clientName: record.clientName,
      category: record.category,
      conversation: record.turns.map(turn => this.turnToObject(turn))
    };
  }

  toJsonLines(turns: Turn[]): string {
    return turns.map(turn => JSON.stringify(this.turnToObject(turn)) + '\n').join('');
  }

  /**
   * Movie-script rendering: one "Label: text" entry per turn; blank turns are left out
   */
  toScript(turns: Turn[]): string {
    return turns
      .map(turn => ({ label: turn.label, text: turn.text.trim() }))
      .filter(turn => turn.text.length > 0)
      .map(turn => (turn.label ? `${turn.label}: ${turn.text}` : turn.text) + '\n')
      .join('');
  }

  render(turns: Turn[], format: ScriptFormat): string {
    return format === 'jsonl' ? this.toJsonLines(turns) : this.toScript(turns);
  }

  writeJsonl(jsonlDir: string, sourceFileName: string, turns: Turn[]): string {
    const jsonlPath = path.join(jsonlDir, `${path.parse(sourceFileName).name}.jsonl`);
    FileHelpers.writeJsonLines(jsonlPath, turns.map(turn => this.turnToObject(turn)));
    logger.debug(`Wrote ${turns.length} turns to ${jsonlPath}`);
    return jsonlPath;
  }

  writeDiscussion(outputFile: string, discussion: DiscussionSet): void {
    FileHelpers.writeJsonFile(outputFile, discussion.map(record => this.toConversationRecord(record)));
    logger.info(`Discussion with ${discussion.length} cases written to ${outputFile}`);
  }
}
