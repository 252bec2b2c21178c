import { describe, it, expect } from 'vitest';
import {
  checkResourcePayload,
  validateListParams,
  validateResourceId,
  validateResourcePayload,
} from '../../../services/opentoclose/validation';
import {
  CONTACT_RULES,
  PROPERTY_CONTACT_RULES,
  PROPERTY_DOCUMENT_RULES,
  PROPERTY_EMAIL_RULES,
  PROPERTY_NOTE_RULES,
  PROPERTY_TASK_RULES,
  TAG_RULES,
} from '../../../services/opentoclose/rules';
import { ValidationError } from '../../../services/opentoclose/errors';
import { createMockLogger } from '../../utils/mocks';

function captureError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('validateListParams', () => {
  it('should return an empty map for missing params', () => {
    expect(validateListParams(undefined)).toEqual({});
    expect(validateListParams(null)).toEqual({});
  });

  it('should reject a limit of zero', () => {
    expect(() => validateListParams({ limit: 0 })).toThrow(
      'Limit must be a positive integer, got 0'
    );
  });

  it('should keep a valid limit unchanged', () => {
    expect(validateListParams({ limit: 50 })).toEqual({ limit: 50 });
  });

  it('should coerce numeric strings and pass other keys through', () => {
    expect(
      validateListParams({ limit: '25', offset: '5', status: 'open', ids: [1, 2] })
    ).toEqual({ limit: 25, offset: 5, status: 'open', ids: [1, 2] });
  });

  it('should name the field and value when coercion fails', () => {
    const error = captureError(() => validateListParams({ limit: 'abc' }));
    expect(error.message).toBe('Limit must be an integer, got string: abc');
    expect(error.fieldErrors).toEqual([{ field: 'limit', message: 'must be an integer' }]);
  });

  it('should reject a negative offset', () => {
    expect(() => validateListParams({ offset: -1 })).toThrow(
      'Offset must be non-negative, got -1'
    );
  });

  it('should warn without failing on a large limit', () => {
    const logger = createMockLogger();
    expect(validateListParams({ limit: 5000 }, {}, logger)).toEqual({ limit: 5000 });
    expect(logger.warn).toHaveBeenCalledWith(
      'Large limit value: 5000. Consider using pagination.',
      { limit: 5000 }
    );
  });

  it('should reject params that are not an object', () => {
    expect(() => validateListParams('limit=5')).toThrow(
      'List parameters must be an object, got string'
    );
    expect(() => validateListParams([1])).toThrow(
      'List parameters must be an object, got array'
    );
  });

  it('should pass unrecognized keys through unchanged', () => {
    const filter = { a: 1 };
    const validated = validateListParams({ filter, ids: [1, 2], q: 'oak' });

    expect(validated).toEqual({ filter: { a: 1 }, ids: [1, 2], q: 'oak' });
    expect(validated.filter).toBe(filter);
  });

  it('should apply resource filters', () => {
    expect(() => validateListParams({ is_active: 'yes' }, TAG_RULES.filters)).toThrow(
      'is_active filter must be a boolean, got: yes'
    );
    expect(() => validateListParams({ author: '  ' }, PROPERTY_NOTE_RULES.filters)).toThrow(
      'author filter must be a non-empty string, got:   '
    );
    expect(validateListParams({ status: 'open' }, PROPERTY_TASK_RULES.filters)).toEqual({
      status: 'open',
    });
  });
});

describe('validateResourcePayload', () => {
  it('should reject non-objects and empty objects', () => {
    expect(() => validateResourcePayload([], 'create', TAG_RULES)).toThrow(
      'Tag data for create must be an object, got array'
    );
    expect(() => validateResourcePayload('tag', 'create', TAG_RULES)).toThrow(
      'Tag data for create must be an object, got string'
    );
    expect(() => validateResourcePayload({}, 'update', TAG_RULES)).toThrow(
      'Tag data for update cannot be empty'
    );
  });

  it('should enforce required fields on create only', () => {
    const error = captureError(() =>
      validateResourcePayload({ color: '#fff' }, 'create', TAG_RULES)
    );
    expect(error.message).toBe('Tag data for create missing required fields: name');
    expect(error.fieldErrors).toEqual([{ field: 'name', message: 'is required' }]);

    expect(() => validateResourcePayload({ color: '#fff' }, 'update', TAG_RULES)).not.toThrow();
  });

  it('should require one identifying field for contacts', () => {
    expect(() => validateResourcePayload({ company: 'Acme' }, 'create', CONTACT_RULES)).toThrow(
      'Contact data for create must include at least one of: email, phone, first_name, last_name'
    );
  });

  it('should reject a contact name on create', () => {
    expect(() =>
      validateResourcePayload({ name: 'Jo', email: 'jo@example.com' }, 'create', CONTACT_RULES)
    ).toThrow(
      "The 'name' field is not supported by the API. Use 'first_name' and 'last_name' fields instead."
    );
  });

  it('should name the field, constraint and value', () => {
    expect(() =>
      validateResourcePayload({ name: 'Hot', color: 'red' }, 'create', TAG_RULES)
    ).toThrow('color must be a valid hex color code (e.g. #FF0000), got: red');

    expect(() => validateResourcePayload({ email: 'nope' }, 'update', CONTACT_RULES)).toThrow(
      'email must be a valid email address, got: nope'
    );

    expect(() =>
      validateResourcePayload({ name: 'Hot', is_active: 'true' }, 'create', TAG_RULES)
    ).toThrow('is_active must be a boolean, got: true');
  });

  it('should check integer fields', () => {
    expect(() => validateResourcePayload({ sort_order: '-1' }, 'update', TAG_RULES)).toThrow(
      'sort_order must be non-negative, got: -1'
    );
    expect(() => validateResourcePayload({ sort_order: 'abc' }, 'update', TAG_RULES)).toThrow(
      'sort_order must be an integer, got: abc'
    );
    expect(() =>
      validateResourcePayload({ assignee_id: 0 }, 'update', PROPERTY_TASK_RULES)
    ).toThrow('assignee_id must be a positive integer, got: 0');
  });

  it('should point at the failing list entry', () => {
    const error = captureError(() =>
      validateResourcePayload(
        { recipients: ['a@example.com', 'nope'] },
        'create',
        PROPERTY_EMAIL_RULES
      )
    );
    expect(error.message).toBe('recipients[1] must be a valid email address, got: nope');
    expect(error.fieldErrors[0]?.field).toBe('recipients[1]');
  });

  it('should check document URLs', () => {
    expect(() =>
      validateResourcePayload(
        { name: 'Contract', url: 'ftp://files.example.test/doc.pdf' },
        'create',
        PROPERTY_DOCUMENT_RULES
      )
    ).toThrow('url must be a valid HTTP/HTTPS URL, got: ftp://files.example.test/doc.pdf');
  });

  it('should accept valid payloads and leave them untouched', () => {
    const data = { name: 'Hot', color: '#FF0000', sort_order: 2, is_active: true };
    validateResourcePayload(data, 'create', TAG_RULES);
    expect(data).toEqual({ name: 'Hot', color: '#FF0000', sort_order: 2, is_active: true });
  });

  it('should warn about fields the provider ignores', () => {
    const logger = createMockLogger();
    validateResourcePayload(
      { contact_id: 5, role: 'Buyer' },
      'create',
      PROPERTY_CONTACT_RULES,
      logger
    );
    expect(logger.warn).toHaveBeenCalledWith(
      "Field 'role' is not supported by the property contact endpoint and will be ignored",
      { field: 'role' }
    );
  });
});

describe('checkResourcePayload', () => {
  it('should return the data on success', () => {
    const result = checkResourcePayload({ name: 'Hot' }, 'create', TAG_RULES);
    expect(result).toEqual({ success: true, data: { name: 'Hot' } });
  });

  it('should return the error instead of throwing', () => {
    const result = checkResourcePayload({}, 'create', TAG_RULES);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe('Tag data for create cannot be empty');
    }
  });
});

describe('validateResourceId', () => {
  it('should accept positive integers', () => {
    expect(validateResourceId(12, 'Contact')).toBe(12);
  });

  it.each([[0], [-3], [1.5], ['7'], [null]])('should reject %j', (id) => {
    expect(() => validateResourceId(id, 'Contact')).toThrow(
      `Contact ID must be a positive integer, got: ${String(id)}`
    );
  });
});
