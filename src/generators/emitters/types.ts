import type { ResolutionResult } from "@/generators/ir/types";

/**
 * Options shared by every emitter
 */
export interface EmitterOptions {
  /** Package (or module) the generated file belongs to */
  packageName: string;
  /** Command line recorded in the generated file header */
  command: string;
}

export interface EmitterResult {
  content: string;
  warnings: string[];
}

/**
 * Renders resolved type descriptors as source text of one target language
 */
export interface Emitter {
  /** Extension of generated files, including the dot */
  fileExtension: string;
  emit(result: ResolutionResult, options: EmitterOptions): EmitterResult;
}
