/**
 * Course Configuration
 *
 * `course.yaml` at the course root, validated with zod, with environment
 * overrides for the platform connection:
 *
 * - CANVAS_API_URL     platform origin (overrides `api_url`)
 * - CANVAS_API_TOKEN   bearer token (never read from the file)
 * - CANVAS_TIMEOUT_MS  request timeout
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { ValidationError } from '../errors/errors';
import { TemplateFragments, loadTemplateFragments } from '../markup/markdown-renderer';
import { parseYamlMapping } from '../parsers/frontmatter-parser';
import { parseWithSchema } from '../parsers/source-schemas';
import { DEFAULT_REGISTRY_PATH, DEFAULT_SHARED_ASSETS_DIR } from '../registry/asset-registry';
import { CanvasClient } from '../remote/canvas-client.service';
import { Logger } from '../utils/logger';

export const COURSE_CONFIG_FILE = 'course.yaml';
export const TEMPLATES_DIR = 'templates';
export const INCLUDES_DIR = 'includes';

const courseConfigSchema = z.object({
  title: z.string().min(1).optional(),
  course_id: z.union([z.string(), z.number()]).transform(String).optional(),
  api_url: z.string().url().optional(),
  template: z.string().min(1).default('default'),
  shared_assets_dir: z.string().min(1).default(DEFAULT_SHARED_ASSETS_DIR),
  registry_path: z.string().min(1).default(DEFAULT_REGISTRY_PATH),
  variables: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).default({}),
});

export interface CourseConfig {
  /** Absolute course root */
  courseRoot: string;
  title?: string;
  courseId?: string;
  apiUrl?: string;
  apiToken?: string;
  timeoutMs?: number;
  template: string;
  sharedAssetsDir: string;
  registryPath: string;
  /** Values for `{{var:name}}` placeholders */
  variables: Record<string, string>;
}

function timeoutFrom(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ValidationError(`CANVAS_TIMEOUT_MS must be a positive integer, got "${value}"`, 'CANVAS_TIMEOUT_MS');
  }
  return timeout;
}

/**
 * Read `course.yaml` (optional) and apply environment overrides.
 * @throws ValidationError when the file or an override is invalid
 */
export function loadCourseConfig(courseRoot: string, env: NodeJS.ProcessEnv = process.env): CourseConfig {
  const root = path.resolve(courseRoot);
  const file = path.join(root, COURSE_CONFIG_FILE);
  const raw = fs.existsSync(file) ? parseYamlMapping(fs.readFileSync(file, 'utf-8'), COURSE_CONFIG_FILE) : {};
  const parsed = parseWithSchema(courseConfigSchema, raw, COURSE_CONFIG_FILE);

  return {
    courseRoot: root,
    title: parsed.title,
    courseId: parsed.course_id,
    apiUrl: env['CANVAS_API_URL'] || parsed.api_url,
    apiToken: env['CANVAS_API_TOKEN'] || undefined,
    timeoutMs: timeoutFrom(env['CANVAS_TIMEOUT_MS']),
    template: parsed.template,
    sharedAssetsDir: parsed.shared_assets_dir,
    registryPath: parsed.registry_path,
    variables: parsed.variables,
  };
}

/** Header and footer fragments of the configured template */
export function loadCourseTemplate(config: CourseConfig): TemplateFragments {
  return loadTemplateFragments(path.join(config.courseRoot, TEMPLATES_DIR, config.template));
}

/**
 * Client for the configured platform.
 * `options.courseId` overrides `course_id`, e.g. when importing another course.
 * @throws ValidationError when the url or token is missing
 */
export function createCanvasClient(
  config: CourseConfig,
  options: { courseId?: string; logger?: Logger; fetch?: typeof fetch } = {}
): CanvasClient {
  const { apiUrl, apiToken } = config;
  if (!apiUrl || !apiToken) {
    const missing = [apiUrl ? undefined : 'CANVAS_API_URL (or api_url)', apiToken ? undefined : 'CANVAS_API_TOKEN'].filter(
      (name): name is string => name !== undefined
    );
    throw new ValidationError(
      `Platform connection is not configured: set ${missing.join(' and ')}`,
      COURSE_CONFIG_FILE,
      missing
    );
  }
  return new CanvasClient({
    baseUrl: apiUrl,
    token: apiToken,
    courseId: options.courseId ?? config.courseId,
    timeoutMs: config.timeoutMs,
    logger: options.logger,
    fetch: options.fetch,
  });
}
