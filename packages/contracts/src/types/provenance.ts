export interface LineRange {
  /** 1-based, inclusive. */
  readonly start: number;
  /** 1-based, inclusive. */
  readonly end: number;
}

export interface PolicySource {
  readonly filePath: string;
  readonly ordinal: number;
  readonly lineRange?: LineRange;
  /** The statement's own `Sid` before a tracking token replaced it. */
  readonly label?: string;
}

export type PolicySourceIndex = ReadonlyMap<string, PolicySource>;

export interface PolicySourceMap {
  readonly statements: PolicySourceIndex;
  readonly identityPolicyText: string;
  readonly permissionsBoundaryText?: string;
  readonly resourcePolicyText?: string;
  readonly resourcePolicyPath?: string;
}
