/**
 * A command documented under a different permission level than the code requires
 */
export interface PermissionMismatch {
  name: string;
  codePermission: string;
  docsPermission: string;
}

/**
 * Result of comparing code-extracted commands with documented ones
 */
export interface ComparisonResult {
  /** Commands in code but not in docs, in code order */
  codeOnly: string[];

  /** Commands in docs but not in code, in docs order */
  docsOnly: string[];

  /** Commands in both, in code order */
  inBoth: string[];

  /** Commands in both whose permission levels disagree */
  permissionMismatches: PermissionMismatch[];
}

/**
 * Statistics about the comparison
 */
export interface ComparisonStats {
  totalCodeCommands: number;
  totalDocsCommands: number;
  codeOnly: number;
  docsOnly: number;
  inBoth: number;
  permissionMismatches: number;
}
