// Contract shared by every cognitive module the registry can drive.

export type CognitiveState = 'idle' | 'processing';

export interface ModuleResponse<C = unknown> {
  content: C;
  confidence: number;   // 0-1
  sourceModule: string;
  metadata: Record<string, unknown>;
}

export type Feedback = Record<string, unknown>;

export interface CognitiveModule {
  readonly name: string;
  readonly state: CognitiveState;

  // Total: must not throw.
  process(input: unknown): ModuleResponse;

  // Unknown keys are ignored.
  update(feedback: Feedback): void;
}
