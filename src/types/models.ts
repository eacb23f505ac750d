/**
 * Core data models for the mail classification engine
 */

export const UNKNOWN_CATEGORY = 'UNK';

export type Token = string;

export interface AddressEntry {
  address: string;
  name?: string; // Display name, e.g. "Jane Doe" in "Jane Doe <jane@example.com>"
}

export interface BodyPart {
  mediaType: string; // MIME-like type, e.g. text/plain or text/html
  text: string; // Decoded content
}

/**
 * Structured document consumed by the token extractor
 */
export interface ClassifiableDocument {
  id: string;
  senders: AddressEntry[];
  recipients: AddressEntry[];
  subject: string;
  agent: string; // X-Mailer / User-Agent header
  parts: BodyPart[];
}

// Gmail API message shape consumed by the email parser
export interface RawMessageHeader {
  name?: string | null;
  value?: string | null;
}

export interface RawMessageBody {
  data?: string | null;
  attachmentId?: string | null;
  size?: number | null;
}

/**
 * One node of a message's MIME tree, as the Gmail API returns it
 */
export interface RawMessagePart {
  mimeType?: string | null;
  filename?: string | null;
  headers?: RawMessageHeader[] | null;
  body?: RawMessageBody | null;
  parts?: RawMessagePart[] | null;
}

export interface RawEmailData {
  id?: string | null;
  threadId?: string | null;
  payload: RawMessagePart;
}

export interface CategoryScore {
  category: string;
  probability: number;
}

/**
 * Source name (e.g. a corpus file) mapped to the category its documents belong to
 */
export type CorpusList = Record<string, string>;

/**
 * true category -> predicted category (or UNK) -> count
 */
export type ConfusionMatrix = Record<string, Record<string, number>>;

export type CategoryCounts = Record<string, number>;

/**
 * Probability and significance (probability squared) cached for one category
 */
export type Predictor = [probability: number, significance: number];

export type PredictorRecord = Record<string, Predictor>;

export interface CacheMeta {
  messagesProcessed: number;
  messagesScoredAsOf: number;
}

export type CombinerName = 'robinson-fisher' | 'odds-product';

export type ModelKind = 'bayesian' | 'trivial';

export interface ClassifierOptions {
  debug: number;
  onDisk: boolean;
  nObservationsRequired: number;
  numberOfPredictors: number;
  minimumWordProb: number;
  maximumWordProb: number;
  scoreDelay: number;
  ignoredTokens: string[];
  combiner: CombinerName;
  scratchDir?: string; // Where disk-backed tables keep their scratch files
}

export interface InterestingWord {
  token: Token;
  significance: number;
  probabilities: Record<string, number>;
}

export interface ScoreDetails {
  scores: CategoryScore[];
  interestingWords: InterestingWord[];
}

export interface ClassifyOptions {
  threshold: number;
  corpusList: CorpusList;
}

export interface CrossValidationOptions extends ClassifyOptions {
  folds: number;
  random?: RandomSource;
}

/**
 * Uniform pseudo-random numbers in [0, 1)
 */
export interface RandomSource {
  next(): number;
}

// Database row interfaces (for SQLite storage)
export interface TableEntryRow {
  entry_key: string;
  entry_value: string; // JSON string
}

export interface SnapshotTableRow {
  table_name: string;
  on_disk: number; // SQLite boolean as integer
}

export interface SnapshotEntryRow {
  table_name: string;
  entry_key: string;
  entry_value: string; // JSON string
}

export interface SnapshotMetaRow {
  meta_key: string;
  meta_value: string;
}
