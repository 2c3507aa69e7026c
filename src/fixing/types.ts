/**
 * Token usage statistics
 */
export type TokenStats = {
  input: number;
  output: number;
};

// The only fields the model may rewrite. Audio is never touched.
export const EDITABLE_FIELDS = ['Front', 'Back'] as const;
export type EditableField = (typeof EDITABLE_FIELDS)[number];

export type FieldUpdates = Partial<Record<EditableField, string>>;

export type SkipReason =
  | 'multiple_matches'
  | 'no_match'
  | 'no_words'
  | 'missing_note';

/**
 * A word or card that selection left out, with the reason shown to the user.
 */
export type SkippedItem = {
  target: string;
  reason: SkipReason;
  details: string;
};

/**
 * A response record that failed validation and is never applied.
 */
export type RejectedRecord = {
  noteId: string;
  reason: string;
};

/**
 * One note as sent to the model.
 */
export type BatchRecord = {
  note_id: number;
  model_name: string;
  fields: Record<string, string>;
  tags: string[];
};

/**
 * A proposed edit: the note's current field values and the fields the
 * model wants to replace.
 */
export type CardChange = {
  noteId: number;
  original: Record<string, string>;
  updated: FieldUpdates;
};

export type ReviewDecision = 'apply' | 'skip' | 'quit';

export type BatchInfo = {
  number: number;
  total: number;
};

export type WriteFailure = {
  noteId: number;
  error: string;
};

export type ApplyResult = {
  applied: number;
  failures: WriteFailure[];
};

export type FixSummary = {
  totalBatches: number;
  notesSent: number;
  proposed: number;
  unchanged: number;
  applied: number;
  writeFailures: WriteFailure[];
  rejected: RejectedRecord[];
  skipped: SkippedItem[];
  failedBatches: Array<{ batch: number; error: string }>;
  skippedBatches: number;
  stoppedEarly: boolean;
};
