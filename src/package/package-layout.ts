/**
 * Archive layout of a course package
 *
 * Paths and resource types follow the Common Cartridge 1.1 layout with the
 * platform's extension files, so conforming importers accept the archive.
 */

export const MANIFEST_PATH = 'imsmanifest.xml';

/** Marks an archive produced in the platform's own export layout */
export const SENTINEL_PATH = 'course_settings/canvas_export.txt';
export const SENTINEL_CONTENT = 'Exported by course-sync\n';

export const COURSE_SETTINGS_PATH = 'course_settings/course_settings.xml';
export const MODULE_META_PATH = 'course_settings/module_meta.xml';
export const ASSIGNMENT_GROUPS_PATH = 'course_settings/assignment_groups.xml';
export const FILES_META_PATH = 'course_settings/files_meta.xml';
export const RUBRICS_PATH = 'course_settings/rubrics.xml';

export const WIKI_DIR = 'wiki_content';
export const WEB_RESOURCES_DIR = 'web_resources';
export const FLAT_QTI_DIR = 'non_cc_assessments';

export const FILEBASE_TOKEN = '$IMS-CC-FILEBASE$';

/** QTI metadata field recording whether an assessment is a quiz or a bank */
export const PLACEMENT_FIELD = 'course_sync_placement';
export type Placement = 'inline' | 'bank';

export const RESOURCE_TYPES = {
  webcontent: 'webcontent',
  learningApplication: 'associatedcontent/imscc_xmlv1p1/learning-application-resource',
  assessment: 'imsqti_xmlv1p2/imscc_xmlv1p1/assessment',
  webLink: 'imswl_xmlv1p1',
} as const;

/** Module item content types in module_meta.xml */
export const MODULE_CONTENT_TYPES = {
  page: 'WikiPage',
  assignment: 'Assignment',
  quiz: 'Quizzes::Quiz',
  link: 'ExternalUrl',
  file: 'Attachment',
} as const;

export const CC_NAMESPACE = 'http://www.imsglobal.org/xsd/imsccv1p1/imscp_v1p1';
export const LOM_MANIFEST_NAMESPACE = 'http://ltsc.ieee.org/xsd/imsccv1p1/LOM/manifest';
export const LOM_RESOURCE_NAMESPACE = 'http://ltsc.ieee.org/xsd/imsccv1p1/LOM/resource';
export const CANVAS_NAMESPACE = 'http://canvas.instructure.com/xsd/cccv1p0';
export const QTI_NAMESPACE = 'http://www.imsglobal.org/xsd/ims_qtiasiv1p2';
export const WEBLINK_NAMESPACE = 'http://www.imsglobal.org/xsd/imsccv1p1/imswl_v1p1';
export const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export function pagePath(slug: string): string {
  return `${WIKI_DIR}/${slug}.html`;
}

export function assignmentHtmlPath(id: string, slug: string): string {
  return `${id}/${slug}.html`;
}

export function assignmentSettingsPath(id: string): string {
  return `${id}/assignment_settings.xml`;
}

export function quizQtiPath(id: string): string {
  return `${id}/assessment_qti.xml`;
}

export function quizMetaPath(id: string): string {
  return `${id}/assessment_meta.xml`;
}

/** The per-assessment file conforming importers read quizzes and banks from */
export function flatQtiPath(id: string): string {
  return `${FLAT_QTI_DIR}/${id}.xml.qti`;
}

export function linkPath(id: string): string {
  return `${id}.xml`;
}

/** `assets/images/a.png` -> `web_resources/images/a.png` */
export function webResourcePath(assetPath: string): string {
  const relative = assetPath.replace(/^assets\//, '');
  return `${WEB_RESOURCES_DIR}/${relative}`;
}

/** `web_resources/images/a.png` -> `assets/images/a.png`; undefined outside web_resources */
export function assetPathFromWebResource(packagePath: string): string | undefined {
  const prefix = `${WEB_RESOURCES_DIR}/`;
  return packagePath.startsWith(prefix) ? `assets/${packagePath.slice(prefix.length)}` : undefined;
}

/** `$IMS-CC-FILEBASE$/images/a.png` for a package path under web_resources */
export function fileBaseUrl(packagePath: string): string {
  const relative = packagePath.slice(`${WEB_RESOURCES_DIR}/`.length);
  return `${FILEBASE_TOKEN}/${relative.split('/').map(encodeURIComponent).join('/')}`;
}

/**
 * Member names that would escape the extraction directory or confuse the
 * file system are refused.
 */
export function isSafePath(member: string): boolean {
  if (!member || member.includes('\0')) {
    return false;
  }
  const normalized = member.split('\\').join('/');
  if (normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) {
    return false;
  }
  return !normalized.split('/').some(segment => segment === '..');
}
