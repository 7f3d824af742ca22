import { spawn } from 'node:child_process';
import * as path from 'node:path';
import { z } from 'zod';
import { OptimizerUnavailable } from '../errors.js';
import { formatIssues } from '../campaign/schema.js';
import type { BuildRequest, OptimizationEngine, Recommendation } from './engine.js';

export interface ProcessEngineOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const BuildResponseSchema = z.object({
  state: z.string(),
});

const RecommendResponseSchema = z.object({
  rows: z.array(z.record(z.union([z.number(), z.string()]))),
  state: z.string().optional(),
});

const ErrorResponseSchema = z.object({
  error: z.string(),
});

const STDERR_TAIL = 500;

/**
 * Parse the engine's answer from the last non-empty stdout line.
 * Anything before it (progress output, warnings) is ignored.
 */
export function parseEngineOutput<T>(stdout: string, schema: z.ZodType<T>): T {
  const lines = stdout.split('\n').map(l => l.trim()).filter(l => l.length > 0);
  const last = lines[lines.length - 1];
  if (last === undefined) {
    throw new OptimizerUnavailable('Engine produced no output');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(last);
  } catch (err) {
    throw new OptimizerUnavailable(
      `Engine output is not JSON: ${last.slice(0, 100)}${last.length > 100 ? '...' : ''}`,
      undefined,
      { cause: err },
    );
  }

  const reported = ErrorResponseSchema.safeParse(parsed);
  if (reported.success) {
    throw new OptimizerUnavailable(`Engine reported: ${reported.data.error}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new OptimizerUnavailable('Engine response has an unexpected shape', { issues: formatIssues(result.error) });
  }
  return result.data;
}

/**
 * Drives an external engine program: one process per call, a JSON request
 * on stdin, a JSON response on the last stdout line. Aborting the signal
 * kills the child.
 */
export class ProcessEngine implements OptimizationEngine {
  readonly name: string;

  constructor(private readonly options: ProcessEngineOptions) {
    this.name = path.basename(options.command);
  }

  async build(request: BuildRequest, signal: AbortSignal): Promise<Buffer> {
    const response = await this.call({ operation: 'build', ...request }, BuildResponseSchema, signal);
    return Buffer.from(response.state, 'base64');
  }

  async recommend(state: Buffer, batchSize: number, signal: AbortSignal): Promise<Recommendation> {
    const response = await this.call(
      { operation: 'recommend', state: state.toString('base64'), batch_size: batchSize },
      RecommendResponseSchema,
      signal,
    );
    return response.state === undefined
      ? { rows: response.rows }
      : { rows: response.rows, state: Buffer.from(response.state, 'base64') };
  }

  private call<T>(request: Record<string, unknown>, schema: z.ZodType<T>, signal: AbortSignal): Promise<T> {
    const { command, args = [], cwd, env } = this.options;

    return new Promise<T>((resolve, reject) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let stdinError: Error | null = null;

      const child = spawn(command, args, {
        cwd,
        env: env ?? process.env,
        signal,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      child.stdin.on('error', (err) => { stdinError = err; });

      child.on('error', (err) => {
        reject(signal.aborted
          ? new OptimizerUnavailable('Engine call aborted', { command })
          : new OptimizerUnavailable(`Engine could not be started: ${err.message}`, { command }, { cause: err }));
      });

      child.on('close', (code, killedBy) => {
        if (signal.aborted) {
          reject(new OptimizerUnavailable('Engine call aborted', { command }));
          return;
        }
        if (code !== 0) {
          const tail = Buffer.concat(stderr).toString('utf-8').trim().slice(-STDERR_TAIL);
          reject(new OptimizerUnavailable(
            `Engine exited with ${code ?? killedBy}${tail ? `: ${tail}` : ''}`,
            { command, code, signal: killedBy },
            stdinError ? { cause: stdinError } : undefined,
          ));
          return;
        }
        try {
          resolve(parseEngineOutput(Buffer.concat(stdout).toString('utf-8'), schema));
        } catch (err) {
          reject(err);
        }
      });

      child.stdin.end(JSON.stringify(request));
    });
  }
}
