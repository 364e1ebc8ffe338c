/**
 * Package Model
 *
 * In-memory form of a Common Cartridge archive with Canvas extensions.
 * Fully derived from a Course on every export; never persisted as state.
 */

import { Course } from './content.model';

/** A manifest `<resource>` */
export interface ManifestResource {
  identifier: string;
  type: string;
  href?: string;
  /** Archive paths listed as `<file href>` */
  files: string[];
  /** Identifiers from `<dependency identifierref>` */
  dependencies: string[];
}

/** A leaf `<item>` in the organization tree */
export interface ManifestItemRef {
  identifier: string;
  title: string;
  /** Resource identifier; undefined for text headers */
  identifierRef?: string;
}

/** A module-level `<item>` in the organization tree */
export interface ManifestModule {
  identifier: string;
  title: string;
  items: ManifestItemRef[];
}

export interface PackageManifest {
  identifier: string;
  title: string;
  modules: ManifestModule[];
  resources: ManifestResource[];
}

export type PackageFileContent = string | Buffer;

export interface CoursePackage {
  manifest: PackageManifest;
  /** Archive path to content, imsmanifest.xml excluded */
  files: Map<string, PackageFileContent>;
}

/** Resource kinds the importer distinguishes */
export type ResourceKind =
  | 'page'
  | 'assignment'
  | 'quiz'
  | 'question-bank'
  | 'link'
  | 'asset'
  | 'course-settings'
  | 'quiz-meta'
  | 'unknown';

export interface SkippedResource {
  identifier: string;
  kind: ResourceKind;
  reason: string;
}

/** Importer stages, in order */
export type ImportStage =
  | 'extract'
  | 'parse-manifest'
  | 'decode-resources'
  | 'resolve-modules'
  | 'resolve-rubrics'
  | 'done';

export interface ImportOutcome {
  course: Course;
  skipped: SkippedResource[];
  warnings: string[];
  /** True when the archive carries the platform export sentinel */
  platformMode: boolean;
}
