import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { ValidationError } from './errors';

const ajv = new Ajv({ allErrors: true });

export interface CreateReviewInput {
  id?: string;
  productId: string;
  userId: string;
  title: string;
  comment?: string;
  rating: number;
  photos?: string[];
  verifiedPurchase?: boolean;
  attributes?: Record<string, number>;
}

export interface CreateResponseInput {
  id?: string;
  userId: string;
  comment: string;
  isSeller?: boolean;
}

const identifier = { type: 'string', minLength: 1, maxLength: 36 };

export const createReviewSchema = {
  type: 'object',
  required: ['productId', 'userId', 'title', 'rating'],
  properties: {
    id: identifier,
    productId: identifier,
    userId: identifier,
    title: { type: 'string', minLength: 1, maxLength: 100 },
    comment: { type: 'string' },
    rating: { type: 'integer', minimum: 1, maximum: 5 },
    photos: { type: 'array', items: { type: 'string', minLength: 1 } },
    verifiedPurchase: { type: 'boolean' },
    attributes: { type: 'object', additionalProperties: { type: 'number' } },
  },
};

export const createResponseSchema = {
  type: 'object',
  required: ['userId', 'comment'],
  properties: {
    id: identifier,
    userId: identifier,
    comment: { type: 'string', minLength: 1, pattern: '\\S' },
    isSeller: { type: 'boolean' },
  },
};

const validateCreateReview: ValidateFunction<CreateReviewInput> = ajv.compile<CreateReviewInput>(createReviewSchema);
const validateCreateResponse: ValidateFunction<CreateResponseInput> = ajv.compile<CreateResponseInput>(createResponseSchema);

function explain(errors: ErrorObject[] | null | undefined): string {
  return ajv.errorsText(errors, { dataVar: 'body' });
}

/** Validate a create-review payload, or explain every problem at once */
export function parseCreateReview(body: unknown): CreateReviewInput | ValidationError {
  if (validateCreateReview(body)) return body;
  return new ValidationError(explain(validateCreateReview.errors), { errors: validateCreateReview.errors ?? [] });
}

export function parseCreateResponse(body: unknown): CreateResponseInput | ValidationError {
  if (validateCreateResponse(body)) return body;
  return new ValidationError(explain(validateCreateResponse.errors), { errors: validateCreateResponse.errors ?? [] });
}
