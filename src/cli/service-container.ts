/**
 * Service Container
 *
 * What the CLI handlers reach the outside world through. Tests pass fakes
 * for any part; everything else falls back to the real implementation.
 */

import { AssetRegistry } from '../registry/asset-registry';
import { CourseConfig, createCanvasClient, loadCourseConfig } from '../services/config.service';
import { loadCourseRegistry, runCourseExport } from '../services/course-export.service';
import { runCourseImport } from '../services/course-import.service';
import { suggestIncludes } from '../services/include-suggestions.service';
import { runPublishPipeline } from '../services/publish-pipeline.service';
import { Logger, createLogger } from '../utils/logger';

/**
 * Console operations interface (for testability)
 */
export interface IConsole {
  log(message: string): void;
  error(message: string): void;
}

/**
 * Process operations interface (for testability)
 */
export interface IProcess {
  /** Set the exit code; the process ends once pending work is done */
  exit(code: number): void;
  env: NodeJS.ProcessEnv;
}

export interface SyncServices {
  loadCourseConfig: typeof loadCourseConfig;
  createCanvasClient: typeof createCanvasClient;
  runPublishPipeline: typeof runPublishPipeline;
  runCourseExport: typeof runCourseExport;
  runCourseImport: typeof runCourseImport;
  suggestIncludes: typeof suggestIncludes;
  loadRegistry(config: CourseConfig, logger?: Logger): AssetRegistry;
}

export interface ServiceContainerConfig {
  console?: IConsole;
  process?: IProcess;
  services?: Partial<SyncServices>;
  logger?: Logger;
}

/**
 * Service container - manages all service dependencies
 */
export class ServiceContainer {
  public readonly console: IConsole;
  public readonly process: IProcess;
  public readonly services: SyncServices;
  public readonly logger: Logger;

  constructor(config: ServiceContainerConfig = {}) {
    this.console = config.console ?? {
      log: message => console.log(message),
      error: message => console.error(message),
    };
    this.process = config.process ?? {
      exit: code => {
        process.exitCode = code;
      },
      env: process.env,
    };
    this.services = {
      loadCourseConfig,
      createCanvasClient,
      runPublishPipeline,
      runCourseExport,
      runCourseImport,
      suggestIncludes,
      loadRegistry: loadCourseRegistry,
      ...config.services,
    };
    this.logger = config.logger ?? createLogger('course-sync');
  }
}
