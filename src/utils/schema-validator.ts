import Ajv, { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import knowledgeBaseSchema from '../schemas/knowledge_base.v1.schema.json';
import sessionSnapshotSchema from '../schemas/session_snapshot.v1.schema.json';
import questionComplexitySchema from '../schemas/question_complexity.v1.schema.json';
import { logger } from './logger';
import { LearnerLevel } from '../config';
import { KnowledgeRecord } from '../types/knowledge';
import { SessionSnapshot } from '../types/interaction';

// Wire shape of a question complexity estimate
export interface QuestionComplexityRecord {
  complexity_level: LearnerLevel;
  subject_area: string;
  key_concepts: string[];
  confidence_score: number;
}

// Type for validation errors
export interface ValidationError {
  path: string;
  message: string;
}

export class SchemaValidationError extends Error {
  public readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'SchemaValidationError';
    this.errors = errors;
  }
}

// Create and configure Ajv instance. Unknown fields are rejected by the
// schemas, not stripped: a malformed knowledge base must fail the whole load.
const ajv = new Ajv({
  allErrors: true,
  useDefaults: true,
});

// Add formats like 'date-time', 'uuid', etc.
addFormats(ajv);

// Compile validators once at startup
const validateKnowledgeBase = ajv.compile<KnowledgeRecord[]>(knowledgeBaseSchema);
const validateSessionSnapshot = ajv.compile<SessionSnapshot>(sessionSnapshotSchema);
const validateQuestionComplexity = ajv.compile<QuestionComplexityRecord>(questionComplexitySchema);

/**
 * Validate a parsed knowledge base file, filling in optional fields
 * @throws SchemaValidationError listing every violation
 */
export function validateKnowledgeBaseRecords(data: unknown): KnowledgeRecord[] {
  if (!validateKnowledgeBase(data)) {
    const errors = formatValidationErrors(validateKnowledgeBase.errors || []);

    logger.warn({
      schema: 'knowledge_base.v1',
      errors,
    }, 'Schema validation failed');

    throw new SchemaValidationError('Invalid knowledge base', errors);
  }

  return data;
}

/**
 * Validate a session snapshot before it is handed to the analytics consumer
 */
export function validateSessionSnapshotMessage(data: unknown): SessionSnapshot {
  if (!validateSessionSnapshot(data)) {
    const errors = formatValidationErrors(validateSessionSnapshot.errors || []);

    logger.warn({
      schema: 'session_snapshot.v1',
      errors,
    }, 'Schema validation failed');

    throw new SchemaValidationError('Invalid session snapshot', errors);
  }

  return data;
}

/**
 * Validate a complexity estimate parsed from a generated reply, filling in
 * optional fields
 */
export function validateQuestionComplexityMessage(data: unknown): QuestionComplexityRecord {
  if (!validateQuestionComplexity(data)) {
    const errors = formatValidationErrors(validateQuestionComplexity.errors || []);

    logger.warn({
      schema: 'question_complexity.v1',
      errors,
    }, 'Schema validation failed');

    throw new SchemaValidationError('Invalid question complexity estimate', errors);
  }

  return data;
}

/**
 * Format Ajv validation errors into a more user-friendly format
 */
function formatValidationErrors(errors: ErrorObject[]): ValidationError[] {
  return errors.map(err => {
    const path = err.instancePath || '/';
    let message = err.message || 'Unknown validation error';

    if (err.keyword === 'additionalProperties' && typeof err.params.additionalProperty === 'string') {
      message = `${message}: '${err.params.additionalProperty}'`;
    }

    return { path, message };
  });
}
