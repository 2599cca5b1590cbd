/**
 * Authentication and authorization types.
 *
 * Supports two auth strategies:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header
 *
 * Each credential maps to an address. That address is the caller of
 * receive operations and the actor recorded on notifications.
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { Address } from "@presign/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "submit" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "submit"],
  admin: ["read", "submit", "admin"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

export function isRole(value: unknown): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 * `anonymous` is used only when the app runs without auth configured.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "anonymous";
  readonly identity: string;
  readonly role: Role;
  readonly address?: Address | undefined;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  readonly sub: string;
  readonly role: Role;
  readonly address: Address;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
