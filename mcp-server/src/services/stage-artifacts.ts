/**
 * Timing and outcome of one step of a matching run.
 */
export interface StageArtifact {
  stage: number;
  name: string;
  status: 'running' | 'completed' | 'failed';
  startedAt: number;
  completedAt?: number;
  durationMs?: number;
  summary: string;
  details?: Record<string, unknown>;
  error?: string;
}

export function createStageArtifact(stage: number, name: string): StageArtifact {
  return {
    stage,
    name,
    status: 'running',
    startedAt: Date.now(),
    summary: '',
  };
}

export function completeStageArtifact(
  artifact: StageArtifact,
  summary: string,
  details?: Record<string, unknown>
): StageArtifact {
  const completedAt = Date.now();
  return {
    ...artifact,
    status: 'completed',
    completedAt,
    durationMs: completedAt - artifact.startedAt,
    summary,
    details,
  };
}

export function failStageArtifact(artifact: StageArtifact, error: string): StageArtifact {
  const completedAt = Date.now();
  return {
    ...artifact,
    status: 'failed',
    completedAt,
    durationMs: completedAt - artifact.startedAt,
    summary: `Failed: ${error}`,
    error,
  };
}

/**
 * Collects artifacts, replacing a stage's running entry when it finishes.
 */
export class StageRecorder {
  private readonly artifacts: StageArtifact[] = [];

  constructor(private readonly onStageComplete?: (artifact: StageArtifact) => void) {}

  async run<T>(
    name: string,
    work: () => T | Promise<T>,
    describe: (value: T) => { summary: string; details?: Record<string, unknown> }
  ): Promise<T> {
    let artifact = createStageArtifact(this.artifacts.length + 1, name);
    this.emit(artifact);

    try {
      const value = await work();
      const { summary, details } = describe(value);
      artifact = completeStageArtifact(artifact, summary, details);
      this.emit(artifact);
      return value;
    } catch (error) {
      artifact = failStageArtifact(artifact, error instanceof Error ? error.message : String(error));
      this.emit(artifact);
      throw error;
    }
  }

  list(): StageArtifact[] {
    return [...this.artifacts];
  }

  private emit(artifact: StageArtifact): void {
    const existingIndex = this.artifacts.findIndex((a) => a.stage === artifact.stage);
    if (existingIndex >= 0) {
      this.artifacts[existingIndex] = artifact;
    } else {
      this.artifacts.push(artifact);
    }
    this.onStageComplete?.(artifact);
  }
}
