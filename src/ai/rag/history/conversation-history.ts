export type TurnRole = 'user' | 'assistant';

export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
}

export function createTurn(role: TurnRole, content: string): Turn {
  return Object.freeze({ role, content });
}

/**
 * Ordered, size-bounded turn log for one session (oldest first).
 * Holds at most two turns per remembered exchange.
 */
export class ConversationHistory {
  private turns: Turn[] = [];
  readonly capacity: number;

  constructor(maxExchanges: number, initial: readonly Turn[] = []) {
    if (!Number.isInteger(maxExchanges) || maxExchanges < 1) {
      throw new RangeError(
        `maxExchanges must be a positive integer, got ${maxExchanges}`,
      );
    }
    this.capacity = maxExchanges * 2;
    for (const turn of initial) {
      this.append(turn);
    }
  }

  get length(): number {
    return this.turns.length;
  }

  append(turn: Turn): void {
    // Evict whole exchanges from the front until there is room
    while (this.turns.length >= this.capacity) {
      this.turns.splice(0, 2);
    }
    this.turns.push(createTurn(turn.role, turn.content));
  }

  appendExchange(userContent: string, assistantContent: string): void {
    this.append(createTurn('user', userContent));
    this.append(createTurn('assistant', assistantContent));
  }

  window(n: number): readonly Turn[] {
    if (n <= 0) return Object.freeze([]);
    return Object.freeze(this.turns.slice(-n));
  }

  all(): readonly Turn[] {
    return Object.freeze([...this.turns]);
  }

  reset(): void {
    this.turns = [];
  }
}
