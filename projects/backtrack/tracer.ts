import type { NodeKind, RegexNode } from './ast.js';
import type { MatchObserver } from './matcher.js';
import { colors, log } from '../utils/debug.js';

export type TraceEvent =
  | { type: 'enter'; node: NodeKind; pos: number }
  | { type: 'match'; node: NodeKind; pos: number; end: number }
  | { type: 'exit'; node: NodeKind; pos: number };

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.type) {
    case 'enter':
      return `ENTER ${event.node} pos=${event.pos}`;
    case 'match':
      return `MATCH ${event.node} ${event.pos}->${event.end}`;
    case 'exit':
      return `EXIT ${event.node} pos=${event.pos}`;
  }
}

/**
 * Records every node entry, candidate and exit of the matches it is passed
 * to. Each event also goes to the debug log as it happens.
 */
export class MatchTracer implements MatchObserver {
  readonly events: TraceEvent[] = [];

  enter(node: RegexNode, pos: number) {
    this.record({ type: 'enter', node: node.kind, pos });
  }

  candidate(node: RegexNode, pos: number, end: number) {
    this.record({ type: 'match', node: node.kind, pos, end });
  }

  exit(node: RegexNode, pos: number) {
    this.record({ type: 'exit', node: node.kind, pos });
  }

  lines(): string[] {
    return this.events.map(formatTraceEvent);
  }

  /**
   * The trace with candidates highlighted, for terminals.
   */
  pretty(): string {
    return this.events
      .map((event) => {
        const line = formatTraceEvent(event);
        return event.type == 'match' ? colors.green(line) : line;
      })
      .join('\n');
  }

  clear() {
    this.events.length = 0;
  }

  private record(event: TraceEvent) {
    this.events.push(event);
    log(formatTraceEvent(event));
  }
}
