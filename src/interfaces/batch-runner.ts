/**
 * Batch runner interface for cxxmatrix.
 *
 * Defines the contract for materializing one batch of compose services.
 * Enables dependency injection and testability.
 */

/** One compose build invocation. */
export interface BatchRequest {
  /** Batch label for logs (e.g. "gcc ubuntu22.04"). */
  label: string;
  /** Compose services to build in parallel. */
  services: string[];
  /** Directory holding the compose manifest. */
  workDir: string;
}

/** Result of one batch invocation. */
export interface BatchResult {
  /** Whether the compose tool exited with status 0 */
  success: boolean;
  exitCode: number;
  /** Error message if failed */
  error?: string;
}

/**
 * Interface for running build batches.
 * Implementations block until the external tool exits.
 */
export interface BatchRunner {
  run(request: BatchRequest): Promise<BatchResult>;
}
