import { describe, expect, it } from 'vitest';
import {
  cursorEnvelopeSchema,
  cursorPaginationMetaSchema,
  groupSchema,
  isEmptyValue,
  pageSchema,
  userSchema,
} from '../../src/schemas/index.js';

describe('Schema Decoding', () => {
  describe('isEmptyValue', () => {
    it.each([[undefined], [null], [''], [0], [false], [[]]])(
      'should treat %j as empty',
      (value: unknown) => {
        expect(isEmptyValue(value)).toBe(true);
      },
    );

    it.each([['x'], [1], [-1], [true], [['a']], [{}]])(
      'should treat %j as present',
      (value: unknown) => {
        expect(isEmptyValue(value)).toBe(false);
      },
    );
  });

  describe('groupSchema', () => {
    it('should decode a full group', () => {
      const group = {
        id: 1,
        url: 'https://acme.zendesk.com/api/v2/groups/1.json',
        name: 'Support',
        default: true,
        deleted: true,
        description: 'Front line',
        created_at: '2026-01-20T10:00:00Z',
        updated_at: '2026-01-21T10:00:00Z',
      };

      expect(groupSchema.parse(group)).toEqual(group);
    });

    it('should drop unknown fields', () => {
      const result = groupSchema.parse({ id: 1, name: 'Support', is_public: true });

      expect(result).toEqual({ id: 1, name: 'Support' });
      expect(Object.keys(result)).not.toContain('is_public');
    });

    it('should treat zero values and null as not provided', () => {
      const result = groupSchema.parse({
        id: 0,
        name: 'Support',
        default: false,
        description: null,
      });

      expect(result.id).toBeUndefined();
      expect(result.default).toBeUndefined();
      expect(result.description).toBeUndefined();
      expect(JSON.stringify(result)).toBe('{"name":"Support"}');
    });

    it('should decode a missing or null name as an empty string', () => {
      expect(groupSchema.parse({}).name).toBe('');
      expect(groupSchema.parse({ name: null }).name).toBe('');
    });

    it('should reject a wrongly typed field', () => {
      const result = groupSchema.safeParse({ id: 'one', name: 'Support' });

      expect(result.success).toBe(false);
    });
  });

  describe('userSchema', () => {
    it('should drop empty tags and null ids', () => {
      const result = userSchema.parse({
        id: 5,
        name: 'Casey',
        tags: [],
        organization_id: null,
        role: 'end-user',
      });

      expect(result).toEqual({ id: 5, name: 'Casey', role: 'end-user' });
    });
  });

  describe('pageSchema', () => {
    it('should default missing page fields', () => {
      expect(pageSchema.parse({})).toEqual({
        next_page: null,
        previous_page: null,
        count: 0,
      });
    });

    it('should keep next and previous page URLs', () => {
      const page = pageSchema.parse({
        next_page: 'https://acme.zendesk.com/api/v2/groups.json?page=3',
        previous_page: 'https://acme.zendesk.com/api/v2/groups.json?page=1',
        count: 250,
        groups: [],
      });

      expect(page).toEqual({
        next_page: 'https://acme.zendesk.com/api/v2/groups.json?page=3',
        previous_page: 'https://acme.zendesk.com/api/v2/groups.json?page=1',
        count: 250,
      });
    });
  });

  describe('cursorPaginationMetaSchema', () => {
    it('should drop empty cursors', () => {
      expect(
        cursorPaginationMetaSchema.parse({
          has_more: false,
          after_cursor: '',
          before_cursor: null,
        }),
      ).toEqual({ has_more: false });
    });

    it('should default a missing meta object', () => {
      expect(cursorEnvelopeSchema.parse({ groups: [] })).toEqual({
        meta: { has_more: false },
      });
    });
  });
});
