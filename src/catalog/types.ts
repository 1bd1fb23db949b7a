export type ProjectStatus = 'active' | 'archived' | 'unknown';

/**
 * Canonical identity of a hosted repository, the cross-machine join key
 */
export interface RemoteIdentity {
  host: string;
  owner: string;
  name: string;
}

/**
 * Declaration fields after defaults are applied
 */
export interface ProjectFields {
  id: string;
  title: string;
  oneLiner: string;
  kind: string;
  categories: string[];
  tags: string[];
  status: ProjectStatus;
}

/**
 * One discovered local project
 */
export interface ProjectRecord extends ProjectFields {
  /** Absolute path of the project root */
  localPath: string;
  /** Configured root the project was found under */
  rootDir: string;
  /** localPath relative to rootDir */
  relativePath: string;
  /** First path segment below the root, used for grouping */
  group: string;
  screenshotPath: string | null;
  screenshotPresent: boolean;
  /** ISO-8601 UTC */
  lastModified: string;
}

/**
 * A scanned project together with its resolved origin
 */
export interface LocalProject {
  record: ProjectRecord;
  identity: RemoteIdentity | null;
  /** ISO-8601 UTC, from the remote-tracking reflog */
  lastPushed: string | null;
}
