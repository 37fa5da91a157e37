/**
 * Access policy for every API route.
 *
 * Decides whether a caller (anonymous, authenticated user or seller) may
 * perform an action on a resource type. Decisions are plain values; the
 * HTTP layer decides how a denial is reported.
 */

export const Action = {
  Read: "read",
  Create: "create",
  Update: "update",
  Delete: "delete",
} as const;
export type Action = (typeof Action)[keyof typeof Action];

export const ResourceType = {
  Category: "category",
  Product: "product",
  ProductReviews: "productReviews",
  User: "user",
  Session: "session",
} as const;
export type ResourceType = (typeof ResourceType)[keyof typeof ResourceType];

export const DenyReason = {
  NotAuthenticated: "NotAuthenticated",
  NotOwner: "NotOwner",
  NotSeller: "NotSeller",
  Unsupported: "Unsupported",
} as const;
export type DenyReason = (typeof DenyReason)[keyof typeof DenyReason];

export type Caller =
  | { kind: "anonymous" }
  | { kind: "user"; id: number; isSeller: boolean };

export const ANONYMOUS: Caller = Object.freeze({ kind: "anonymous" });

/** The part of a resource instance the policy looks at. */
export interface OwnedResource {
  ownerId: number | null;
}

export type Decision =
  | { allowed: true }
  | { allowed: false; reason: DenyReason };

type Ownership = "none" | "required" | "ifPresent";

interface Rule {
  authenticated: boolean;
  seller: boolean;
  ownership: Ownership;
}

const PUBLIC: Rule = { authenticated: false, seller: false, ownership: "none" };
// Own session / own account: the caller's identity is implied unless a
// concrete resource says otherwise.
const OWN: Rule = { authenticated: true, seller: false, ownership: "ifPresent" };
const SELLER: Rule = { authenticated: true, seller: true, ownership: "none" };
const OWNING_SELLER: Rule = {
  authenticated: true,
  seller: true,
  ownership: "required",
};

const POLICY: Record<ResourceType, Partial<Record<Action, Rule>>> = {
  session: { create: PUBLIC, update: OWN, delete: OWN },
  user: { create: PUBLIC, read: OWN },
  category: { read: PUBLIC },
  product: { read: PUBLIC, create: SELLER, update: OWNING_SELLER },
  productReviews: { read: PUBLIC },
};

const ALLOW: Decision = Object.freeze({ allowed: true });

const deny = (reason: DenyReason): Decision => ({ allowed: false, reason });

export function evaluate(
  caller: Caller,
  action: Action,
  resourceType: ResourceType,
  resource?: OwnedResource | null,
): Decision {
  const rule = POLICY[resourceType]?.[action];
  if (!rule) return deny(DenyReason.Unsupported);

  if (caller.kind === "anonymous") {
    return rule.authenticated ? deny(DenyReason.NotAuthenticated) : ALLOW;
  }

  if (rule.seller && !caller.isSeller) return deny(DenyReason.NotSeller);

  switch (rule.ownership) {
    case "required":
      if (!resource || resource.ownerId !== caller.id) {
        return deny(DenyReason.NotOwner);
      }
      return ALLOW;
    case "ifPresent":
      if (resource && resource.ownerId !== caller.id) {
        return deny(DenyReason.NotOwner);
      }
      return ALLOW;
    default:
      return ALLOW;
  }
}

export const callerFromUser = (user: {
  id: number;
  role: string;
}): Caller => ({
  kind: "user",
  id: user.id,
  isSeller: user.role === "seller",
});
