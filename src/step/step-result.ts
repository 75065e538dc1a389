import { StepArtifact, StepResultJSON } from '../types/step';

/**
 * Outcome of one step run: a success flag, a human-readable message and
 * the named artifacts handed to later steps.
 */
export class StepResult {
  public success = true;
  public message = '';
  private readonly artifacts = new Map<string, StepArtifact>();

  constructor(
    public readonly stepName: string,
    public readonly implementer: string
  ) {}

  /**
   * Mark the result failed with a message. Returns `this` for early returns.
   */
  fail(message: string): this {
    this.success = false;
    this.message = message;
    return this;
  }

  addArtifact(name: string, value: string, description?: string): void {
    this.artifacts.set(name, { name, value, description });
  }

  getArtifactValue(name: string): string | undefined {
    return this.artifacts.get(name)?.value;
  }

  getArtifacts(): StepArtifact[] {
    return [...this.artifacts.values()];
  }

  toJSON(): StepResultJSON {
    return {
      stepName: this.stepName,
      implementer: this.implementer,
      success: this.success,
      message: this.message,
      artifacts: this.getArtifacts(),
    };
  }
}
