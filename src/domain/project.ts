/**
 * Project domain model.
 *
 * Projects form a forest: a root project plays the role of an
 * organisation and children hang below it. Projects are the unit of
 * authorization and data scoping.
 */

export interface ProjectMetadata {
  /** Set for projects created by a user's first login. */
  selfEnrolled?: boolean;
  displayName?: string;
  description?: string;
}

export interface Project {
  id: string;
  parentId?: string;
  name: string;
  metadata: ProjectMetadata;
  createdAt: string;
  updatedAt: string;
}

const PROJECT_NAME_PATTERN = /^[a-zA-Z0-9](?:[-_.a-zA-Z0-9 ]{0,61}[a-zA-Z0-9])?$/;

/** Validate a project name; returns a reason or null. */
export function validateProjectName(name: string): string | null {
  if (name.length === 0) return 'project name cannot be empty';
  if (!PROJECT_NAME_PATTERN.test(name)) return `invalid project name: ${name}`;
  return null;
}
