import type { GameDefinition } from "../config/types.js";
import type { Logger } from "../logging/logger.js";

export class GameLibrary {
  private selected: GameDefinition | null = null;

  constructor(
    private readonly games: readonly GameDefinition[],
    private readonly logger: Logger,
    private readonly defaultGame?: string,
  ) {}

  get current(): GameDefinition | null {
    return this.selected;
  }

  list(): readonly GameDefinition[] {
    return this.games;
  }

  find(name: string): GameDefinition | undefined {
    const wanted = name.toLowerCase();
    return this.games.find((g) => g.name.toLowerCase() === wanted);
  }

  /**
   * Selects a configured game by name (case-insensitive), or the default
   * game when no name is given. Returns null and keeps the previous
   * selection when nothing matches.
   */
  select(name?: string): GameDefinition | null {
    const target = name ?? this.defaultGame;
    if (target === undefined) {
      this.logger.warn("No game named and no default game configured");
      return null;
    }
    const game = this.find(target);
    if (!game) {
      this.logger.warn({ game: target }, "Game not found in library");
      return null;
    }
    this.selected = game;
    this.logger.info({ game: game.name }, "Game selected");
    return game;
  }

  clear(): void {
    this.selected = null;
  }
}
