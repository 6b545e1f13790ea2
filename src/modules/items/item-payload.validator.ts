import { plainToInstance } from 'class-transformer';
import { validateSync, type ValidationError as ConstraintViolation } from 'class-validator';

import { CreateInventoryItemDto } from './dto/create-inventory-item.dto';
import type { FieldError } from '../common/api-errors';

export type ItemPayloadCheck =
  | { ok: true; dto: CreateInventoryItemDto }
  | { ok: false; errors: FieldError[] };

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function notAnObjectMessage(value: unknown): string {
  return `Invalid data. Expected a dictionary, but got ${describeType(value)}.`;
}

export function isPayloadObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFieldErrors(violations: ConstraintViolation[], index?: number): FieldError[] {
  return violations.map(violation => ({
    ...(index !== undefined ? { index } : {}),
    field: violation.property,
    messages: Object.values(violation.constraints ?? {}),
  }));
}

/**
 * Structural check of one item payload. `index` tags the errors with the
 * element's position when the payload is part of a batch.
 */
export function checkItemPayload(value: unknown, index?: number): ItemPayloadCheck {
  if (!isPayloadObject(value)) {
    return {
      ok: false,
      errors: [{ ...(index !== undefined ? { index } : {}), messages: [notAnObjectMessage(value)] }],
    };
  }
  const dto = plainToInstance(CreateInventoryItemDto, value);
  const violations = validateSync(dto, { whitelist: true });
  if (violations.length > 0) {
    return { ok: false, errors: toFieldErrors(violations, index) };
  }
  return { ok: true, dto };
}
