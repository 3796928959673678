import { Logger } from "./Logger";

const SEPARATOR = "=".repeat(70);

/**
 * Structured logging for one workflow run: begin/end banners per state
 * transition, with the active step prefixed to every message.
 *
 * One instance per workflow invocation, so concurrent workflows never share
 * step state.
 */
export class WorkflowLogger {
  private step: string | null = null;
  private startTime: number | null = null;

  constructor(
    private readonly logger: Logger,
    private readonly workflow: string
  ) {}

  beginStep(step: string, description?: string): void {
    this.step = step;
    this.startTime = Date.now();

    this.logger.info(SEPARATOR);
    this.logger.info(
      `BEGIN ${this.workflow} / ${step}${description ? ` - ${description}` : ""}`
    );
  }

  endStep(): void {
    if (this.step !== null && this.startTime !== null) {
      this.logger.info(
        `END ${this.workflow} / ${this.step} (completed in ${Date.now() - this.startTime}ms)`
      );
      this.logger.info(SEPARATOR);
    }
    this.step = null;
    this.startTime = null;
  }

  info(message: string): void {
    this.logger.info(`${this.prefix()}${message}`);
  }

  warn(message: string): void {
    this.logger.warn(`${this.prefix()}${message}`);
  }

  /**
   * Log a halted workflow with the state reached, for manual resumption
   */
  halted(state: string | null, error: Error): void {
    this.logger.error(
      `${this.workflow} halted after state ${state ?? "(none)"}: ${error.message}`
    );
    this.step = null;
    this.startTime = null;
  }

  private prefix(): string {
    return this.step ? `[${this.workflow}/${this.step}] ` : `[${this.workflow}] `;
  }
}
