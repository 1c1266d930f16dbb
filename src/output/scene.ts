import type { Logger } from "../logging/logger.js";

export interface SceneController {
  /** Resolves false when the switch did not happen. */
  switchToEndingScene(): Promise<boolean>;
}

/** Stand-in for a studio scene switcher; only records the request. */
export class NullSceneController implements SceneController {
  private switched = false;

  constructor(private readonly logger: Logger) {}

  get endingSceneShown(): boolean {
    return this.switched;
  }

  async switchToEndingScene(): Promise<boolean> {
    this.switched = true;
    this.logger.info("Ending scene requested (no scene controller attached)");
    return true;
  }
}
