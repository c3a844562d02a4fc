/**
 * Stable identifier for a (real or synthetic) patient.
 *
 * When profiles are supplied, these are reused verbatim in every record.
 */
export type PatientId = string;

/** Device roles a patient can carry one device for. */
export type DeviceRole = "wearable" | "speech" | "app" | "clinic";

export type DeviceIds = Partial<Record<DeviceRole, string>>;

/**
 * Clinical screening scores recorded once per patient.
 *
 * - `mmse` / `moca`: 0..30
 * - `depression_score`: 0..27 (PHQ-9 style)
 */
export type CognitiveBaseline = {
  mmse: number;
  moca: number;
  depression_score: number;
};

/**
 * Static patient profile, either loaded from a profiles file or produced by
 * `generateProfiles(...)`.
 *
 * Every field except `patient_id` may be absent in externally supplied files.
 */
export type PatientProfile = {
  patient_id?: PatientId;
  name?: string;
  dob?: string;
  sex?: string;
  education_years?: number;
  comorbidities?: string[];
  medications?: string[];
  device_ids?: DeviceIds;
  cognitive_baseline?: Partial<CognitiveBaseline>;
};

/** Domains a simulator can produce records for. */
export type Domain =
  | "composite"
  | "mobility"
  | "executive_function"
  | "memory"
  | "language";

/**
 * The cognitive inputs every domain baseline is derived from.
 */
export type CognitiveDrivers = {
  /** Cognitive factor, `clamp((mmse + moca) / 60, 0.3, 1.0)`. */
  cf: number;
  depressionScore: number;
  /** `min(0.15, depressionScore * 0.005)`. */
  depPenalty: number;
};

/**
 * Screening scores after defaults are substituted, plus the drivers derived
 * from them.
 */
export type ResolvedBaseline = CognitiveDrivers & {
  mmse: number;
  moca: number;
};

/**
 * Patient identity after reconciling a request against supplied profiles.
 */
export type ResolvedIdentity = {
  /** 0-based position in the run; also drives positional device ids. */
  index: number;
  patientId: PatientId;
  deviceId: string;
  profile: PatientProfile | null;
};

export type AttentionMetrics = {
  digit_span_max: number;
  errors: number;
  latency_sec: number;
};

export type ExecutiveSpeechMetrics = {
  verbal_fluency_words: number;
  articulation_rate_wps: number;
  avg_pause_ms: number;
};

export type CompositeMemoryMetrics = {
  immediate_recall: number;
  delayed_recall: number;
  intrusion_errors: number;
};

export type OrientationMetrics = {
  date_correct: boolean;
  city_correct: boolean;
  /** 0, 4 or 8. */
  orientation_correct: number;
};

export type ProcessingSpeedMetrics = {
  avg_reaction_time_ms: number;
  missed_trials: number;
};

export type MoodBehaviorMetrics = {
  sentiment_score: number;
  narrative_coherence: number;
  /** 1..5 */
  mood_score: number;
};

export type CompositeMetrics = {
  attention: AttentionMetrics;
  executive_function: ExecutiveSpeechMetrics;
  memory: CompositeMemoryMetrics;
  orientation: OrientationMetrics;
  processing_speed: ProcessingSpeedMetrics;
  mood_behavior: MoodBehaviorMetrics;
};

/** One multi-domain session per patient per day. */
export type CompositeRecord = CompositeMetrics & {
  device_id: string;
  patient_id: PatientId;
  session_date: string;
};

export type MobilityMetrics = {
  gait_speed_mps: number;
  stride_variability_pct: number;
  daily_steps: number;
  fall_detected: boolean;
};

export type ExecutiveTestMetrics = {
  tmt_b_completion_sec: number;
  errors: number;
  symbol_digit_correct: number;
};

export type RecallTestMetrics = {
  immediate_recall_correct: number;
  delayed_recall_correct: number;
  intrusion_errors: number;
};

export type LanguageMetrics = {
  verbal_fluency_words: number;
  avg_pause_ms: number;
  articulation_rate_wps: number;
  sentiment_score: number;
};

type SingleDomainBase = {
  device_id: string;
  patient_id: PatientId;
  timestamp: string;
  signal_quality: number;
};

export type MobilityRecord = SingleDomainBase & {
  domain: "mobility";
  metrics: MobilityMetrics;
  task_type: "passive_gait_monitoring";
};

export type ExecutiveRecord = SingleDomainBase & {
  domain: "executive_function";
  metrics: ExecutiveTestMetrics;
  task_type: "trail_making_test_b";
};

export type MemoryRecord = SingleDomainBase & {
  domain: "memory";
  metrics: RecallTestMetrics;
  test_type: "MoCA_recall";
};

export type LanguageRecord = SingleDomainBase & {
  domain: "language";
  metrics: LanguageMetrics;
  task_type: "verbal_fluency_test";
};

export type SingleDomainRecord =
  | MobilityRecord
  | ExecutiveRecord
  | MemoryRecord
  | LanguageRecord;

export type SessionRecord = CompositeRecord | SingleDomainRecord;

/**
 * Inputs for one generation run, after validation.
 */
export type GenerationParams = {
  domain: Domain;
  patients: number;
  days: number;
  /** UTC midnight of the first simulated day. */
  startDate: Date;
  seed: number | null;
  profiles: PatientProfile[] | null;
  useAllProfiles: boolean;
  strictCount: boolean;
};

export type GenerationResult<R extends SessionRecord = SessionRecord> = {
  records: R[];
  warnings: string[];
  patientsUsed: number;
  expected: number;
  actual: number;
};
