/**
 * Policies for registering an ID that is already in use.
 *
 * @module
 */

export const CollisionPolicy = {
  REPLACE: "Replace",
  REPLACE_AND_WARN: "ReplaceAndWarn",
  WARN: "Warn",
  FAIL: "Fail",
} as const;

export type CollisionPolicy = (typeof CollisionPolicy)[keyof typeof CollisionPolicy];

export const COLLISION_POLICIES: readonly CollisionPolicy[] = Object.values(CollisionPolicy);

/**
 * Parses a parameter value case-insensitively.
 *
 * @returns the policy, or undefined when the text names none
 */
export function parseCollisionPolicy(value: string): CollisionPolicy | undefined {
  const lower = value.trim().toLowerCase();
  return COLLISION_POLICIES.find((p) => p.toLowerCase() === lower);
}
