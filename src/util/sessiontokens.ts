import { DEFAULT_SESSION_TOKENS } from "./constants.js";
import { logger } from "./logger.js";

export interface SessionTokenSource {
  isSessionToken(name: string): boolean;
}

// ===========================================================================
export class SessionTokenRegistry implements SessionTokenSource {
  private tokens = new Set<string>();

  constructor(tokens: Iterable<string> = DEFAULT_SESSION_TOKENS) {
    for (const token of tokens) {
      this.add(token);
    }
  }

  add(name: string) {
    const token = name.trim().toLowerCase();
    if (!token) {
      logger.warn("Ignoring empty session token name", {}, "sessionTokens");
      return;
    }
    this.tokens.add(token);
  }

  remove(name: string) {
    return this.tokens.delete(name.trim().toLowerCase());
  }

  isSessionToken(name: string) {
    return this.tokens.has(name.toLowerCase());
  }

  get names(): string[] {
    return [...this.tokens].sort();
  }
}

export const noSessionTokens: SessionTokenSource = {
  isSessionToken: () => false,
};
