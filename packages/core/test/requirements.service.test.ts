import { beforeEach, describe, expect, it } from 'vitest';

import {
  AllRequirement,
  AnyRequirement,
  buildRequirement,
  buildRequirements,
  TemplateRequirement,
  validateClaims,
  ValueRequirement,
} from '../src/services/requirements.service.js';
import { compileTemplate } from '../src/utils/template.js';

import { createMockLogger, type MockLogger } from './helpers/fixtures.js';

const variables = {
  Method: 'GET',
  Host: 'app.example.com',
  Path: '/home',
  Scheme: 'https',
  URL: 'https://app.example.com/home',
  TENANT: 'acme',
};

describe('requirements', () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  const matches = (requirement: unknown, claim: unknown) =>
    buildRequirement(requirement, logger).validate(claim, variables);

  describe('ValueRequirement', () => {
    it('matches wildcard domains in both directions', () => {
      expect(matches('example.com', '*.example.com')).toBe(true);
      expect(matches('*.example.com', 'test.example.com')).toBe(true);
      expect(matches('test.example.com', '*.company.com')).toBe(false);
    });

    it('matches exact strings and rejects others', () => {
      expect(matches('api.example.com', 'api.example.com')).toBe(true);
      expect(matches('api.example.com', 'web.example.com')).toBe(false);
    });

    it('accepts any matching element of an array claim', () => {
      expect(matches('admin', ['user', 'admin'])).toBe(true);
      expect(matches('admin', ['user', 'guest'])).toBe(false);
      expect(matches(2, [1, 2, 3])).toBe(true);
    });

    it('skips array elements that are malformed patterns', () => {
      expect(matches('admin', ['[z-a]', 'admin'])).toBe(true);
      expect(matches('admin', ['[z-a]'])).toBe(false);
    });

    it('matches object keys without a nested requirement', () => {
      expect(matches('admin', { admin: true, user: true })).toBe(true);
      expect(matches('admin', { user: true })).toBe(false);
    });

    it('compares numbers only against numbers', () => {
      expect(matches(5, 5)).toBe(true);
      expect(matches(5, 6)).toBe(false);
      expect(matches('5', 5)).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        { required: '5', type: 'string' },
        'unsupported requirement type for numeric claim comparison',
      );
    });

    it('never matches a string claim against a non-string requirement', () => {
      expect(matches(5, '5')).toBe(false);
    });

    it('falls back to structural equality', () => {
      expect(matches(true, true)).toBe(true);
      expect(matches(true, false)).toBe(false);
      expect(matches(null, null)).toBe(true);
      expect(new ValueRequirement(['a', 'b'], undefined, logger).validate(['a', 'b'], {})).toBe(
        true,
      );
    });
  });

  describe('nested requirements', () => {
    const required = { 'test.example.com': ['user', 'admin'] };

    it('matches any required value against any supplied value', () => {
      expect(matches(required, { '*.example.com': 'user' })).toBe(true);
      expect(matches(required, { '*.example.com': ['other', 'admin'] })).toBe(true);
      expect(matches(required, { '*.example.com': 'guest' })).toBe(false);
    });

    it('matches a single required value within a supplied list', () => {
      expect(
        matches({ 'test.example.com': 'admin' }, { '*.example.com': ['user', 'admin'] }),
      ).toBe(true);
    });

    it('compares nested values structurally', () => {
      expect(matches({ acme: { plan: 'pro' } }, { acme: { plan: 'pro' } })).toBe(true);
      expect(matches({ acme: { plan: 'pro' } }, { acme: { plan: 'free' } })).toBe(false);
    });

    it('accepts any nested value when the requirement is null', () => {
      expect(matches({ acme: null }, { acme: ['anything'] })).toBe(true);
    });

    it('requires the key to match before the nested value', () => {
      expect(matches(required, { 'other.company.com': 'admin' })).toBe(false);
    });
  });

  describe('composition', () => {
    it('treats a list as OR', () => {
      const requirement = buildRequirement(['admin', 'owner'], logger);
      expect(requirement).toBeInstanceOf(AnyRequirement);
      expect(requirement.validate('owner', variables)).toBe(true);
      expect(requirement.validate('user', variables)).toBe(false);
    });

    it('requires every $and entry to match the same value', () => {
      const requirement = { $and: ['user', 'billing'] };
      expect(matches(requirement, ['user', 'billing', 'support'])).toBe(true);
      expect(matches(requirement, ['user'])).toBe(false);
    });

    it('requires any $or entry to match', () => {
      const requirement = { $or: ['admin', 'owner'] };
      expect(matches(requirement, ['user', 'owner'])).toBe(true);
      expect(matches(requirement, ['user'])).toBe(false);
    });

    it('nests operators', () => {
      const requirement = { $and: ['user', { $or: ['billing', 'support'] }] };
      expect(matches(requirement, ['user', 'support'])).toBe(true);
      expect(matches(requirement, ['user', 'sales'])).toBe(false);
    });

    it('builds AllRequirement for $and', () => {
      const requirement = buildRequirement({ $and: ['a'] }, logger);
      expect(requirement).toBeInstanceOf(AnyRequirement);
      expect(requirement instanceof AnyRequirement && requirement.requirements[0]).toBeInstanceOf(
        AllRequirement,
      );
    });

    it('rejects unknown operators', () => {
      expect(() => buildRequirement({ $xor: ['a'] }, logger)).toThrow(
        'unknown requirement operator: $xor',
      );
    });
  });

  describe('TemplateRequirement', () => {
    it('expands request variables before matching', () => {
      expect(matches('{{.Host}}', 'app.example.com')).toBe(true);
      expect(matches('{{.TENANT}}.example.com', 'globex.example.com')).toBe(false);
      expect(matches('{{.TENANT}}.example.com', 'acme.example.com')).toBe(true);
    });

    it('builds template requirements for object keys', () => {
      expect(matches({ '{{.TENANT}}': 'admin' }, { acme: ['admin'] })).toBe(true);
      expect(matches({ '{{.TENANT}}': 'admin' }, { globex: ['admin'] })).toBe(false);
    });

    it('fails and logs when a variable is missing', () => {
      const template = compileTemplate('{{.Region}}');
      const requirement = new TemplateRequirement(template, undefined, logger);

      expect(requirement.validate('eu', variables)).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        { template: '{{.Region}}', error: 'map has no entry for key "Region"' },
        'failed to expand requirement template',
      );
    });

    it('rejects malformed templates when built', () => {
      expect(() => buildRequirement('{{Upper .Host}}', logger)).toThrow(
        'function "Upper" not defined',
      );
    });
  });

  describe('validateClaims', () => {
    it('passes when every claim is satisfied', () => {
      const requirements = buildRequirements(
        { aud: 'api.example.com', roles: ['admin', 'owner'] },
        logger,
      );
      expect(() =>
        validateClaims(requirements, { aud: 'api.example.com', roles: ['owner'] }, variables),
      ).not.toThrow();
    });

    it('reports the first missing claim', () => {
      const requirements = buildRequirements({ aud: 'api.example.com' }, logger);
      expect(() => validateClaims(requirements, { sub: 'user-1' }, variables)).toThrow(
        'claim is not present: aud',
      );
    });

    it('reports the first invalid claim', () => {
      const requirements = buildRequirements({ aud: 'api.example.com', sub: 'user-1' }, logger);
      expect(() =>
        validateClaims(requirements, { aud: 'web.example.com', sub: 'user-1' }, variables),
      ).toThrow('claim is not valid: aud');
    });

    it('prefixes build errors with the claim name', () => {
      expect(() => buildRequirements({ roles: { $not: 'admin' } }, logger)).toThrow(
        'require.roles: unknown requirement operator: $not',
      );
    });

    it('accepts an AllRequirement over several claims of one value', () => {
      const requirement = new AllRequirement([
        new ValueRequirement('user', undefined, logger),
        new ValueRequirement('admin', undefined, logger),
      ]);
      expect(requirement.validate(['admin', 'user'], variables)).toBe(true);
      expect(requirement.validate(['admin'], variables)).toBe(false);
    });
  });
});
