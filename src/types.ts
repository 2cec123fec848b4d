export type CSVRow = {
  Username?: string;
  Email?: string;
  Passphrase?: string;
  Thumb?: string;
  // Extra columns (e.g. ID from plex-to-csv) are carried along untouched
  [key: string]: string | undefined;
};

/** Library access for an account: every library, or an explicit list of library ids */
export type LibrarySelection = "all" | readonly string[];

export type AccountDescriptor = {
  readonly username: string;
  readonly email: string;
  readonly password: string;
  readonly avatarSource?: string;
  readonly libraryIds?: LibrarySelection;
  readonly roles?: readonly string[];
};

export type StepOutcome = "set" | "skipped" | "failed";

export type ProvisionedAccount = {
  descriptor: AccountDescriptor;
  remoteId: string;
  created: true;
  steps: {
    policy: StepOutcome;
    library: StepOutcome;
    avatar: StepOutcome;
  };
};

/** Permission document stored per user on the server */
export type PolicyDocument = Record<string, unknown>;

export type Library = {
  id: string;
  name: string;
};

export type FailureRecord = {
  recordNumber: number;
  username?: string;
  email?: string;
  errorType: "row_invalid" | "user_create" | "identity_resolution";
  errorMessage: string;
  httpStatus?: number;
  responseBody?: string;
  timestamp: string;
  rawRow?: CSVRow;
};

export type OutcomeTally = {
  succeeded: number;
  failed: number;
};

export type BatchSummary = OutcomeTally & {
  total: number;
  dryRun: boolean;
  startedAt: number;
  endedAt: number;
  failures: FailureRecord[];
  accounts: ProvisionedAccount[];
};
