export type SelectionPolicy =
  | { kind: "all-old-versions" }
  | { kind: "named-flows"; names: string[] }
  // Interactive pick from the flows that have old versions; names pre-seed the pick
  | { kind: "browse"; names?: string[] };

export type OrgConfig = {
  readonly instanceUrl: string;
  readonly clientId: string;
  readonly clientSecret?: string;
  readonly callbackPort: number;
  readonly selectionPolicy: SelectionPolicy;
  readonly skipProductionCheck: boolean;
  readonly autoConfirmProduction: boolean;
};

export type AuthSession = {
  readonly state: string;
  readonly codeVerifier: string;
  readonly codeChallenge: string;
  readonly port: number;
  readonly deadline: number; // epoch ms
};

export type TokenSet = {
  readonly accessToken: string;
  readonly instanceUrl: string;
  readonly tokenType: string;
  readonly identityUrl?: string;
  readonly issuedAt?: number;
};

export type OrgProfile = {
  readonly isSandbox: boolean;
  readonly organizationId: string;
  readonly name: string;
  readonly organizationType?: string;
  // "fallback" when the Organization query failed and the org is assumed production
  readonly classifiedBy: "query" | "fallback";
};

export type FlowVersionCandidate = {
  readonly durableId: string;
  readonly flowDefinitionApiName: string;
  readonly definitionId: string;
  readonly masterLabel: string;
  readonly versionNumber: number;
  readonly status: string;
  readonly isActive: boolean;
  readonly isLatest: boolean;
};

export type DeletionOutcome =
  | { status: "deleted" }
  | { status: "failed"; reason: string }
  | { status: "skipped"; reason: string };

export type DeletionRecord = {
  candidate: FlowVersionCandidate;
  outcome: DeletionOutcome;
  httpStatus?: number;
  batch: number; // 1-based, 0 when the candidate never reached a batch
};

export type RunFailure = {
  code: string;
  message: string;
};

export type RunStatus = "completed" | "skipped" | "failed";

export type RunResult = {
  tenant: string;
  authenticated: boolean;
  status: RunStatus;
  profile?: OrgProfile;
  deletionRecords: DeletionRecord[];
  skipReason?: string;
  fatalError?: RunFailure;
  startedAt: number;
  endedAt: number;
};
