/**
 * Permission evaluation: maps granted scopes onto a resource × permission matrix.
 * Pure and deterministic; results are memoized per scope set.
 */

// ── Vocabulary ──

export const RESOURCES = [
  'user',
  'api_key',
  'analytics',
  'admin',
  'system',
  'billing',
  'webhook',
  'integration',
] as const;

export type Resource = (typeof RESOURCES)[number];

export const PERMISSIONS = [
  'create',
  'read',
  'update',
  'delete',
  'list',
  'search',
  'export',
  'import',
  'manage',
  'configure',
  'monitor',
  'execute',
  'deploy',
  'debug',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

/** `write` is satisfied by any of create, update or manage. */
export type RequiredPermission = Permission | 'write';

const WRITE_EQUIVALENTS: readonly Permission[] = ['create', 'update', 'manage'];

/** Scope that grants every permission on every resource. */
export const ADMIN_SCOPE = 'admin';

export interface ScopeDefinition {
  name: string;
  description: string;
  inherits: string[];
  permissions: Array<[Resource, Permission]>;
}

export const DEFAULT_SCOPES: readonly ScopeDefinition[] = [
  {
    name: 'read',
    description: 'Read-only access to basic resources',
    inherits: [],
    permissions: [['user', 'read'], ['api_key', 'read']],
  },
  {
    name: 'write',
    description: 'Read and write access to basic resources',
    inherits: ['read'],
    permissions: [['user', 'update'], ['api_key', 'create'], ['api_key', 'update']],
  },
  {
    name: 'analytics',
    description: 'Access to usage analytics and reporting',
    inherits: ['read'],
    permissions: [['analytics', 'read'], ['analytics', 'list'], ['analytics', 'export'], ['api_key', 'monitor']],
  },
  {
    name: 'user_management',
    description: 'Full user management capabilities',
    inherits: ['read', 'write'],
    permissions: [['user', 'create'], ['user', 'delete'], ['user', 'list'], ['user', 'search'], ['user', 'manage']],
  },
  {
    name: 'api_management',
    description: 'Full API key management capabilities',
    inherits: ['read', 'write'],
    permissions: [
      ['api_key', 'delete'], ['api_key', 'list'], ['api_key', 'search'], ['api_key', 'manage'], ['api_key', 'configure'],
    ],
  },
  {
    name: ADMIN_SCOPE,
    description: 'Full administrative access',
    inherits: ['read', 'write', 'analytics', 'user_management', 'api_management'],
    permissions: [
      ['admin', 'manage'], ['system', 'configure'], ['system', 'monitor'], ['system', 'debug'],
      ['billing', 'read'], ['billing', 'manage'], ['webhook', 'manage'], ['integration', 'manage'],
    ],
  },
];

export function isResource(value: string): value is Resource {
  return RESOURCES.some(r => r === value);
}

export function isPermission(value: string): value is Permission {
  return PERMISSIONS.some(p => p === value);
}

export function permissionString(resource: Resource, permission: Permission): string {
  return `${resource}:${permission}`;
}

// ── Types ──

export interface PermissionDenial {
  error: 'insufficient_permissions';
  message: string;
  requiredPermission: string;
  currentScopes: string[];
  /** What the presented scopes do allow on the requested resource */
  availablePermissions: Permission[];
}

export type AuthorizationResult =
  | { allowed: true }
  | { allowed: false; statusCode: 403; body: PermissionDenial };

// ── Evaluator ──

export class PermissionEvaluator {
  private readonly definitions = new Map<string, ScopeDefinition>();
  private readonly cache = new Map<string, ReadonlySet<string>>();
  private static readonly CACHE_LIMIT = 1_000;

  constructor(definitions: readonly ScopeDefinition[] = DEFAULT_SCOPES) {
    for (const def of definitions) this.definitions.set(def.name, def);
  }

  hasPermission(scopes: readonly string[], resource: Resource, permission: RequiredPermission): boolean {
    const granted = this.grants(scopes);
    if (permission === 'write') {
      return WRITE_EQUIVALENTS.some(p => granted.has(permissionString(resource, p)));
    }
    return granted.has(permissionString(resource, permission));
  }

  hasAnyPermission(scopes: readonly string[], resource: Resource, permissions: readonly RequiredPermission[]): boolean {
    return permissions.some(p => this.hasPermission(scopes, resource, p));
  }

  /** Every granted `resource:permission`, sorted. */
  effectivePermissions(scopes: readonly string[]): string[] {
    return [...this.grants(scopes)].sort();
  }

  /** Permissions granted on one resource, in vocabulary order. */
  resourcePermissions(scopes: readonly string[], resource: Resource): Permission[] {
    const granted = this.grants(scopes);
    return PERMISSIONS.filter(p => granted.has(permissionString(resource, p)));
  }

  /** Whether each scope is a known named scope or a valid `resource:permission` / `resource:*`. */
  validateScopes(scopes: readonly string[]): Record<string, boolean> {
    const result: Record<string, boolean> = {};
    for (const scope of scopes) result[scope] = this.isKnownScope(scope);
    return result;
  }

  isKnownScope(scope: string): boolean {
    return this.definitions.has(scope) || parseQualified(scope) !== null;
  }

  /** Named scopes that cover all of `required`, smallest grant first. */
  suggestScopes(required: readonly string[]): string[] {
    const candidates: Array<{ name: string; size: number }> = [];
    for (const name of this.definitions.keys()) {
      const granted = this.grants([name]);
      if (required.every(r => granted.has(r))) candidates.push({ name, size: granted.size });
    }
    return candidates.sort((a, b) => a.size - b.size).map(c => c.name);
  }

  /** Warnings for scopes already implied by another scope in the same set. */
  scopeConflicts(scopes: readonly string[]): string[] {
    const warnings: string[] = [];
    for (const outer of scopes) {
      const implied = this.inheritedNames(outer);
      for (const inner of scopes) {
        if (inner !== outer && implied.has(inner)) {
          warnings.push(`Scope '${outer}' already includes '${inner}' - '${inner}' is redundant`);
        }
      }
    }
    return warnings;
  }

  describeScope(name: string): (ScopeDefinition & { effectivePermissions: string[] }) | null {
    const def = this.definitions.get(name);
    if (!def) return null;
    return { ...def, effectivePermissions: this.effectivePermissions([name]) };
  }

  /** Allow, or a 403 body explaining what is missing. */
  authorize(scopes: readonly string[], resource: Resource, permission: RequiredPermission): AuthorizationResult {
    if (this.hasPermission(scopes, resource, permission)) return { allowed: true };
    const required = `${resource}:${permission}`;
    return {
      allowed: false,
      statusCode: 403,
      body: {
        error: 'insufficient_permissions',
        message: `API key lacks required permission: ${required}`,
        requiredPermission: required,
        currentScopes: [...scopes],
        availablePermissions: this.resourcePermissions(scopes, resource),
      },
    };
  }

  private grants(scopes: readonly string[]): ReadonlySet<string> {
    const cacheKey = [...new Set(scopes)].sort().join('\u0000');
    const cached = this.cache.get(cacheKey);
    if (cached) return cached;

    const granted = new Set<string>();
    if (scopes.includes(ADMIN_SCOPE)) {
      for (const r of RESOURCES) for (const p of PERMISSIONS) granted.add(permissionString(r, p));
    } else {
      const visited = new Set<string>();
      for (const scope of scopes) this.collect(scope, granted, visited);
      // manage on a resource implies everything on it
      for (const r of RESOURCES) {
        if (granted.has(permissionString(r, 'manage'))) {
          for (const p of PERMISSIONS) granted.add(permissionString(r, p));
        }
      }
    }

    if (this.cache.size >= PermissionEvaluator.CACHE_LIMIT) this.cache.clear();
    this.cache.set(cacheKey, granted);
    return granted;
  }

  private collect(scope: string, granted: Set<string>, visited: Set<string>): void {
    if (visited.has(scope)) return;
    visited.add(scope);

    const qualified = parseQualified(scope);
    if (qualified) {
      const perms = qualified.permission === '*' ? PERMISSIONS : [qualified.permission];
      for (const p of perms) granted.add(permissionString(qualified.resource, p));
      return;
    }

    const def = this.definitions.get(scope);
    if (!def) return;
    for (const [r, p] of def.permissions) granted.add(permissionString(r, p));
    for (const parent of def.inherits) this.collect(parent, granted, visited);
  }

  private inheritedNames(scope: string): Set<string> {
    const names = new Set<string>();
    const stack = [...(this.definitions.get(scope)?.inherits ?? [])];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || names.has(next)) continue;
      names.add(next);
      stack.push(...(this.definitions.get(next)?.inherits ?? []));
    }
    return names;
  }
}

function parseQualified(scope: string): { resource: Resource; permission: Permission | '*' } | null {
  const idx = scope.indexOf(':');
  if (idx <= 0) return null;
  const resource = scope.slice(0, idx);
  const permission = scope.slice(idx + 1);
  if (!isResource(resource)) return null;
  if (permission === '*') return { resource, permission };
  return isPermission(permission) ? { resource, permission } : null;
}
