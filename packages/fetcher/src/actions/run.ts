import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from '@workspace/logger';
import { z } from 'zod';
import {
  fetcherOptionsFromEnv,
  type FetcherSettingsInput,
} from '../config.js';
import { TaskBuildError, isFetchError } from '../errors.js';
import { fetchAll } from '../orchestrator/async-fetch.js';
import { buildTask } from '../task/task-builder.js';
import {
  HTTP_METHODS,
  RESPONSE_DECODINGS,
  type TaskDescriptor,
} from '../task/types.js';
import type { TransportFactory } from '../transport/types.js';
import { formatJson } from '../utils/json.js';

const log = createLogger('cli');

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const lowerCaseFlag = (value: unknown) => {
  if (value === undefined) {
    return 'false';
  }

  if (typeof value === 'string') {
    return value.toLowerCase();
  }

  return value;
};

const integerFromCli = (flag: string, min: number) =>
  z.preprocess(
    (value) => {
      if (typeof value === 'string') {
        const parsedValue = Number(value.trim());
        return Number.isFinite(parsedValue) ? parsedValue : value;
      }

      return value;
    },
    z
      .number({ invalid_type_error: `Invalid --${flag}. Provide a number.` })
      .int(`Invalid --${flag}. Provide an integer.`)
      .min(min, `Invalid --${flag}. Provide an integer >= ${min}.`),
  );

const optionalPath = (flag: string) =>
  z
    .preprocess(
      (value) => {
        if (typeof value === 'string') {
          const trimmed = value.trim();
          return trimmed.length ? trimmed : undefined;
        }

        return value;
      },
      z.string().min(1, `Invalid --${flag} path`),
    )
    .optional();

const runArgsSchema = z.object({
  tasks: z
    .string({ required_error: 'Missing required option: --tasks' })
    .trim()
    .min(1, 'Missing required option: --tasks'),
  timeout: integerFromCli('timeout', 1).optional(),
  retries: integerFromCli('retries', 0).optional(),
  retryDelay: integerFromCli('retryDelay', 0).optional(),
  serviceName: z.string().trim().min(1, 'Invalid --serviceName').optional(),
  caFile: optionalPath('caFile'),
  outputFile: optionalPath('outputFile'),
  pretty: z.preprocess(lowerCaseFlag, booleanFromCliSchema).default(false),
});

const queryValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const taskEntrySchema = z.object({
  url: z.string().min(1, 'Task url is required'),
  method: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(HTTP_METHODS))
    .optional(),
  body: z.unknown().optional(),
  headers: z.record(z.string(), z.string()).optional(),
  apiKey: z.string().optional(),
  responseDecoding: z.enum(RESPONSE_DECODINGS).optional(),
  languageCode: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  query: z
    .record(z.string(), z.union([queryValueSchema, z.array(queryValueSchema)]))
    .optional(),
  doNotWait: z.boolean().optional(),
  numRetries: z.number().int().min(-1).optional(),
  failSilently: z.boolean().optional(),
  autodetectContentType: z.boolean().optional(),
});

/**
 * Tasks file: an object mapping task names to `buildTask` options plus `url`.
 */
const tasksFileSchema = z.record(z.string(), taskEntrySchema);

type RunArgs = z.infer<typeof runArgsSchema>;
type TasksFile = z.infer<typeof tasksFileSchema>;

type RunActionDeps = {
  env?: Record<string, string | undefined>;
  transportFactory?: TransportFactory;
};

function describeIssue(error: z.ZodError, source: string): string {
  const issue = error.issues[0];
  if (!issue) {
    return `Invalid ${source}`;
  }

  const path = issue.path.join('.');
  return path ? `Invalid ${source} at ${path}: ${issue.message}` : issue.message;
}

class TasksFileError extends Error {
  constructor(path: string, cause: unknown) {
    super(
      `Cannot read tasks file ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'TasksFileError';
  }
}

async function loadTasksFile(path: string): Promise<TasksFile> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new TasksFileError(path, error);
  }

  return tasksFileSchema.parse(json);
}

function buildTaskMap(tasks: TasksFile): Map<string, TaskDescriptor> {
  const taskMap = new Map<string, TaskDescriptor>();

  for (const [name, { url, ...options }] of Object.entries(tasks)) {
    taskMap.set(name, buildTask(url, options));
  }

  return taskMap;
}

function toSettings(args: RunArgs): FetcherSettingsInput {
  const settings: FetcherSettingsInput = {};

  if (args.timeout !== undefined) {
    settings.timeoutMs = args.timeout;
  }
  if (args.retries !== undefined) {
    settings.numRetries = args.retries;
  }
  if (args.retryDelay !== undefined) {
    settings.retryDelayMs = args.retryDelay;
  }
  if (args.serviceName !== undefined) {
    settings.serviceName = args.serviceName;
  }
  if (args.caFile !== undefined) {
    settings.caFile = args.caFile;
  }

  return settings;
}

/**
 * Runs the tasks file as one batch and prints or writes the results.
 * Flags take precedence over `FETCHER_*` variables.
 */
export async function runFetchAction(
  args: RunArgs,
  deps: RunActionDeps = {},
): Promise<number> {
  const startTime = Date.now();

  let settings: FetcherSettingsInput;
  try {
    settings = {
      ...fetcherOptionsFromEnv(deps.env ?? process.env),
      ...toSettings(args),
    };
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error(describeIssue(error, 'environment'));
      return 1;
    }
    throw error;
  }

  let taskMap: Map<string, TaskDescriptor>;
  try {
    taskMap = buildTaskMap(await loadTasksFile(args.tasks));
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error(describeIssue(error, 'tasks file'));
      return 1;
    }
    if (error instanceof TaskBuildError || error instanceof TasksFileError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  log.info('Starting batch', { tasksFile: args.tasks, tasks: taskMap.size });

  try {
    const results = await fetchAll(taskMap, {
      ...settings,
      transportFactory: deps.transportFactory,
    });
    const output = formatJson(Object.fromEntries(results), args.pretty);

    if (args.outputFile) {
      await mkdir(dirname(args.outputFile), { recursive: true });
      await writeFile(args.outputFile, output, 'utf-8');
    } else {
      console.log(output);
    }

    log.info(`Execution finished in ${Date.now() - startTime}ms`);
    return 0;
  } catch (error) {
    if (!isFetchError(error)) {
      throw error;
    }

    log.error('Batch failed', error);
    console.error(
      formatJson(
        { success: false, kind: error.kind, error: error.message },
        args.pretty,
      ),
    );
    return 1;
  }
}

export { runArgsSchema, tasksFileSchema };
export type { RunActionDeps, RunArgs, TasksFile };
