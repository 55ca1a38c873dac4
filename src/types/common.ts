export interface PaginationOptions {
  limit: number;
  offset: number;
}

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required: boolean;
  maxLength?: number;
  min?: number;
  max?: number;
  enum?: readonly string[];
  /** For arrays: maximum number of elements. */
  maxItems?: number;
}

export type BodySchema = Record<string, FieldSchema>;
