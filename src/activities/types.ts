// --- Activity Directory Types ---

export interface Activity {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

/** Activity name → activity, in seed order. */
export type ActivityMap = Record<string, Activity>;

export type DirectoryErrorKind = 'not_found' | 'conflict' | 'bad_request';

export interface DirectoryError {
  kind: DirectoryErrorKind;
  detail: string;
}

export type DirectoryResult =
  | { ok: true; message: string }
  | { ok: false; error: DirectoryError };
