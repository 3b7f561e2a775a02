import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  PERMISSIONS,
  PermissionEvaluator,
  RESOURCES,
  isPermission,
  isResource,
} from '../src/core/permissions.js';
import type { ScopeDefinition } from '../src/core/permissions.js';

const evaluator = new PermissionEvaluator();

describe('PermissionEvaluator', () => {
  describe('hasPermission', () => {
    it('grants what a named scope lists', () => {
      expect(evaluator.hasPermission(['read'], 'user', 'read')).toBe(true);
      expect(evaluator.hasPermission(['read'], 'user', 'update')).toBe(false);
    });

    it('follows inheritance', () => {
      expect(evaluator.hasPermission(['analytics'], 'api_key', 'read')).toBe(true);
      expect(evaluator.hasPermission(['analytics'], 'api_key', 'monitor')).toBe(true);
    });

    it('treats write as create, update or manage', () => {
      expect(evaluator.hasPermission(['write'], 'api_key', 'write')).toBe(true);
      expect(evaluator.hasPermission(['read'], 'api_key', 'write')).toBe(false);
    });

    it('lets manage on a resource imply every permission on it', () => {
      expect(evaluator.hasPermission(['user_management'], 'user', 'export')).toBe(true);
      expect(evaluator.hasPermission(['api_management'], 'api_key', 'deploy')).toBe(true);
      expect(evaluator.hasPermission(['api_management'], 'user', 'export')).toBe(false);
    });

    it('accepts resource:permission and resource:* scopes', () => {
      expect(evaluator.hasPermission(['billing:read'], 'billing', 'read')).toBe(true);
      expect(evaluator.hasPermission(['billing:read'], 'billing', 'update')).toBe(false);
      expect(evaluator.hasPermission(['webhook:*'], 'webhook', 'deploy')).toBe(true);
    });

    it('ignores unknown scopes', () => {
      expect(evaluator.hasPermission(['nope', 'billing:fly'], 'billing', 'read')).toBe(false);
      expect(evaluator.hasPermission([], 'user', 'read')).toBe(false);
    });

    it('admin grants every permission on every resource', () => {
      fc.assert(fc.property(
        fc.constantFrom(...RESOURCES),
        fc.constantFrom(...PERMISSIONS),
        (resource, permission) => evaluator.hasPermission(['admin'], resource, permission),
      ));
    });

    it('survives inheritance cycles', () => {
      const defs: ScopeDefinition[] = [
        { name: 'a', description: '', inherits: ['b'], permissions: [['user', 'read']] },
        { name: 'b', description: '', inherits: ['a'], permissions: [['user', 'list']] },
      ];
      const cyclic = new PermissionEvaluator(defs);
      expect(cyclic.effectivePermissions(['a'])).toEqual(['user:list', 'user:read']);
    });
  });

  it('hasAnyPermission needs one match', () => {
    expect(evaluator.hasAnyPermission(['read'], 'user', ['delete', 'read'])).toBe(true);
    expect(evaluator.hasAnyPermission(['read'], 'user', ['delete', 'create'])).toBe(false);
  });

  it('lists effective permissions sorted', () => {
    expect(evaluator.effectivePermissions(['read'])).toEqual(['api_key:read', 'user:read']);
  });

  it('lists permissions on one resource in vocabulary order', () => {
    expect(evaluator.resourcePermissions(['write'], 'api_key')).toEqual(['create', 'read', 'update']);
  });

  it('validates scopes', () => {
    expect(evaluator.validateScopes(['read', 'billing:read', 'webhook:*', 'bogus', 'billing:fly', 'nope:read'])).toEqual({
      read: true,
      'billing:read': true,
      'webhook:*': true,
      bogus: false,
      'billing:fly': false,
      'nope:read': false,
    });
  });

  it('suggests the smallest covering scopes first', () => {
    expect(evaluator.suggestScopes(['analytics:read'])).toEqual(['analytics', 'admin']);
    expect(evaluator.suggestScopes(['user:read'])).toEqual([
      'read', 'write', 'analytics', 'api_management', 'user_management', 'admin',
    ]);
  });

  it('warns about redundant scopes', () => {
    expect(evaluator.scopeConflicts(['admin', 'read'])).toEqual([
      "Scope 'admin' already includes 'read' - 'read' is redundant",
    ]);
    expect(evaluator.scopeConflicts(['read', 'billing:read'])).toEqual([]);
  });

  it('describes named scopes', () => {
    expect(evaluator.describeScope('read')?.effectivePermissions).toEqual(['api_key:read', 'user:read']);
    expect(evaluator.describeScope('missing')).toBeNull();
  });

  describe('authorize', () => {
    it('allows a granted permission', () => {
      expect(evaluator.authorize(['admin'], 'system', 'debug')).toEqual({ allowed: true });
    });

    it('explains a denial', () => {
      expect(evaluator.authorize(['read'], 'api_key', 'delete')).toEqual({
        allowed: false,
        statusCode: 403,
        body: {
          error: 'insufficient_permissions',
          message: 'API key lacks required permission: api_key:delete',
          requiredPermission: 'api_key:delete',
          currentScopes: ['read'],
          availablePermissions: ['read'],
        },
      });
    });
  });
});

describe('vocabulary guards', () => {
  it('recognise resources and permissions', () => {
    expect(isResource('billing')).toBe(true);
    expect(isResource('payroll')).toBe(false);
    expect(isPermission('deploy')).toBe(true);
    expect(isPermission('write')).toBe(false);
  });
});
