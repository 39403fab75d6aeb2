/**
 * Transformation context - the mutable record one file's pipeline run works on
 */

import type {
  Variable,
  MixinReference,
  FunctionCall,
  ImportStatement,
  TransformationStep,
  PassWarning,
} from './types.js';

export interface MixinStats {
  resolved: number;
  flagged: number;
}

export class TransformationContext {
  /** Content as received; never rewritten */
  readonly sourceContent: string;

  /** Content after the passes run so far */
  currentContent: string;

  /** Optional path, only used in messages */
  readonly sourceFile?: string;

  processingStep: TransformationStep = 'created';

  variables: Variable[] = [];
  mixins: MixinReference[] = [];
  functions: FunctionCall[] = [];
  imports: ImportStatement[] = [];

  readonly warnings: PassWarning[] = [];
  readonly mixinStats: MixinStats = { resolved: 0, flagged: 0 };

  private readonly applied: string[] = [];

  constructor(sourceContent: string, sourceFile?: string) {
    this.sourceContent = sourceContent;
    this.currentContent = sourceContent;
    this.sourceFile = sourceFile;
  }

  /**
   * Transformation names in the order they were first recorded
   */
  get transformationsApplied(): readonly string[] {
    return this.applied;
  }

  /**
   * Record a transformation; a name is kept at most once
   */
  addTransformation(name: string): void {
    if (!this.applied.includes(name)) {
      this.applied.push(name);
    }
  }

  updateContent(content: string, step: TransformationStep): void {
    this.currentContent = content;
    this.processingStep = step;
  }

  addWarning(kind: string, message: string, line?: number): void {
    this.warnings.push({ step: this.processingStep, kind, message, line });
  }

  /**
   * Find an extracted variable by name (without `$`)
   */
  getVariable(name: string): Variable | undefined {
    return this.variables.find((v) => v.name === name);
  }

  get lineCount(): number {
    return this.sourceContent.split('\n').length;
  }
}
