import type { KidRecord } from "../family/records";
import { where, type FieldFilter } from "../storage/gateway";

export type MomentScope =
  | { kind: "byKid"; kidId: string }
  | { kind: "byKidPublicOnly"; kidId: string };

type AccessList = Partial<Pick<KidRecord, "allowedGrandparents">>;

export interface TimelineAccessInput {
  kidId: string;
  kid: AccessList;
  includePrivate: boolean;
  grandparentEmail?: string;
}

export interface TimelineAccess {
  scope: MomentScope;
  includesPrivate: boolean;
}

/**
 * Exact, case-sensitive membership test. An empty or missing access list
 * never authorizes.
 */
export function canViewPrivate(
  kid: AccessList,
  grandparentEmail?: string
): boolean {
  if (!grandparentEmail) {
    return false;
  }
  return (kid.allowedGrandparents ?? []).includes(grandparentEmail);
}

/**
 * Resolves which moments a timeline request may see. A request for private
 * moments from someone outside the kid's access list is not an error: it gets
 * the public-only scope and `includesPrivate: false`, exactly as if private
 * moments had never been asked for.
 */
export function decideTimelineAccess(input: TimelineAccessInput): TimelineAccess {
  const publicOnly: TimelineAccess = {
    scope: { kind: "byKidPublicOnly", kidId: input.kidId },
    includesPrivate: false
  };

  if (!input.includePrivate || !canViewPrivate(input.kid, input.grandparentEmail)) {
    return publicOnly;
  }

  return {
    scope: { kind: "byKid", kidId: input.kidId },
    includesPrivate: true
  };
}

export function scopeToFilters(scope: MomentScope): FieldFilter[] {
  switch (scope.kind) {
    case "byKid":
      return [where("kidId", "==", scope.kidId)];
    case "byKidPublicOnly":
      return [where("kidId", "==", scope.kidId), where("visibility", "==", "public")];
    default: {
      const unreachable: never = scope;
      throw new Error(`Unhandled moment scope: ${JSON.stringify(unreachable)}`);
    }
  }
}
