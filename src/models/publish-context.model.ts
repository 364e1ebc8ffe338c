/**
 * Publish Pipeline Models
 */

import { RemotePublisher } from '../remote/remote.types';
import { CourseConfig } from '../services/config.service';
import { Logger } from '../utils/logger';

import { ContentKind } from './content.model';

export type PublishStage =
  | 'load-registry'
  | 'parse'
  | 'render-upload'
  | 'remote-sync'
  | 'prune'
  | 'package'
  | 'save-registry'
  | 'complete';

/**
 * Options for a publish run
 */
export interface PublishOptions {
  /** Course root directory */
  courseRoot: string;

  publisher: RemotePublisher;

  /** Defaults to course.yaml plus the environment */
  config?: CourseConfig;

  /** Drop registry records whose files are gone */
  prune?: boolean;

  /** Also write a package to this path */
  packagePath?: string;

  /** Write the rendered HTML cache here for debugging */
  cacheDumpPath?: string;

  logger?: Logger;
}

/**
 * What happened to one item
 */
export interface PublishItemResult {
  id: string;
  kind: ContentKind;
  title: string;
  remoteId: string;
}

/**
 * Result of a publish run
 */
export interface PublishResult {
  startedAt: string;
  completedAt: string;

  items: PublishItemResult[];

  /** Upload calls made this run; assets already in the registry are not counted */
  uploads: number;

  /** Items skipped by the loader, as messages */
  errors: string[];

  /** References left as written and other non-fatal problems */
  warnings: string[];

  /** Registry records removed by the prune stage */
  pruned?: number;

  packagePath?: string;
  packageBytes?: number;
}

/**
 * State carried between publish stages
 */
export interface PublishContext {
  options: PublishOptions;
  stage: PublishStage;
  warnings: string[];
  uploads: number;
}
