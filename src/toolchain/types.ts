/**
 * Shared result and error types for the build steps.
 *
 * Every step returns a {@link StepResult}; callers check `success` after
 * each call and stop at the first failure.
 *
 * @packageDocumentation
 */

/**
 * Classification of build failures.
 *
 * - `unreachable_dependency`: git, the compiler, the interpreter, the remote
 *   repository or the proto root is missing or unreachable
 * - `compilation`: the compiler rejected its input or produced no output
 * - `rewrite_mismatch`: a generated import has a shape the rewrite table
 *   does not cover
 * - `load_verification`: a generated module failed to import
 * - `filesystem`: an unexpected file system failure
 */
export type BuildErrorKind =
  | 'unreachable_dependency'
  | 'compilation'
  | 'rewrite_mismatch'
  | 'load_verification'
  | 'filesystem';

/**
 * Name of the step that produced a result.
 */
export type BuildStep = 'fetch' | 'compile' | 'relocate' | 'rewrite' | 'verify' | 'clean';

/**
 * A build failure.
 */
export interface BuildError {
  /** Failure classification. */
  readonly kind: BuildErrorKind;
  /** Step that failed. */
  readonly step: BuildStep;
  /** Human-readable description. */
  readonly message: string;
  /** Command line of the failing external process. */
  readonly command?: string;
  /** Exit code of the failing external process. */
  readonly exitCode?: number;
  /** Captured stderr of the failing external process. */
  readonly stderr?: string;
  /** File involved in the failure. */
  readonly filePath?: string;
  /** 1-based line number within `filePath`. */
  readonly line?: number;
  /** Further per-item detail, e.g. the names of failed probes. */
  readonly details?: readonly string[];
}

/**
 * Outcome of a build step.
 */
export type StepResult<T> = { readonly success: true; readonly value: T } | StepFailure;

/**
 * The failure branch of {@link StepResult}, assignable to any `StepResult<T>`.
 */
export interface StepFailure {
  readonly success: false;
  readonly error: BuildError;
}

/**
 * Creates a successful result.
 *
 * @param value - The step's output.
 * @returns A successful StepResult.
 */
export function createSuccessResult<T>(value: T): Extract<StepResult<T>, { success: true }> {
  return { success: true, value };
}

/**
 * Creates a failure result.
 *
 * @param error - The error that occurred.
 * @returns A failed StepResult.
 */
export function createFailureResult(error: BuildError): StepFailure {
  return { success: false, error };
}

/**
 * Wraps an unexpected thrown value as a `filesystem` failure.
 *
 * @param step - The step that was running.
 * @param error - The thrown value.
 * @param filePath - The file being processed, if known.
 * @returns A failed StepResult.
 */
export function filesystemFailure(step: BuildStep, error: unknown, filePath?: string): StepFailure {
  const message = error instanceof Error ? error.message : String(error);
  return createFailureResult(
    filePath === undefined
      ? { kind: 'filesystem', step, message }
      : { kind: 'filesystem', step, message, filePath }
  );
}

/**
 * Builds a failure from the output of an external process, carrying its
 * command line, exit code and stderr.
 *
 * @param kind - Failure classification.
 * @param step - The step that was running.
 * @param message - Human-readable description.
 * @param output - The process output.
 * @returns A failed StepResult.
 */
export function commandFailure(
  kind: BuildErrorKind,
  step: BuildStep,
  message: string,
  output: CommandOutput
): StepFailure {
  const error: BuildError =
    output.exitCode === undefined
      ? { kind, step, message, command: output.command, stderr: output.stderr }
      : {
          kind,
          step,
          message,
          command: output.command,
          exitCode: output.exitCode,
          stderr: output.stderr,
        };
  return createFailureResult(error);
}

/**
 * Options for one external process invocation.
 */
export interface CommandOptions {
  /** Working directory of the process. */
  readonly cwd: string;
}

/**
 * Output of an external process.
 *
 * `exitCode` is undefined when the process could not be started at all
 * (missing executable, bad working directory).
 */
export interface CommandOutput {
  /** The command line, for messages. */
  readonly command: string;
  /** Process exit code, or undefined if it never started. */
  readonly exitCode: number | undefined;
  /** Captured stdout. */
  readonly stdout: string;
  /** Captured stderr, or the spawn error message. */
  readonly stderr: string;
}

/**
 * Runs external processes. The pipeline receives one of these instead of
 * spawning directly so that tests can substitute an in-process fake.
 */
export interface CommandRunner {
  /**
   * Runs a command to completion.
   *
   * @param file - Executable name or path.
   * @param args - Arguments.
   * @param options - Process options.
   * @returns The captured output. Never rejects for a failing process.
   */
  run(file: string, args: readonly string[], options: CommandOptions): Promise<CommandOutput>;
}
