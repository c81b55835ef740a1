/**
 * Process identity of an image under construction.
 *
 * provisioning ──dropPrivileges──▶ privilege_dropped ──handOff──▶ running
 *
 * Transitions only move forward. Once privileges are dropped the filesystem
 * layers are frozen: nothing can request superuser rights again.
 */

export const SUPERUSER = "root";

export type IdentityPhase = "provisioning" | "privilege_dropped" | "running";

export type IdentityState =
  | { phase: "provisioning"; user: typeof SUPERUSER }
  | { phase: "privilege_dropped"; user: string }
  | { phase: "running"; user: string; entrypoint: string[] };

export type TransitionResult =
  | { ok: true; identity: IdentityState }
  | { ok: false; code: "invalid_transition" | "privilege_escalation_denied"; message: string };

export type PrivilegeCheck =
  | { ok: true }
  | { ok: false; code: "privilege_escalation_denied"; message: string };

export function initialIdentity(): IdentityState {
  return { phase: "provisioning", user: SUPERUSER };
}

export function dropPrivileges(identity: IdentityState, user: string): TransitionResult {
  if (identity.phase !== "provisioning") {
    return { ok: false, code: "invalid_transition", message: `cannot drop privileges from ${identity.phase}` };
  }
  if (user === SUPERUSER || user === "0") {
    return { ok: false, code: "privilege_escalation_denied", message: "service user must not be the superuser" };
  }
  return { ok: true, identity: { phase: "privilege_dropped", user } };
}

export function handOff(identity: IdentityState, entrypoint: readonly string[]): TransitionResult {
  if (identity.phase !== "privilege_dropped") {
    return { ok: false, code: "invalid_transition", message: `cannot hand off from ${identity.phase}` };
  }
  if (entrypoint.length === 0) {
    return { ok: false, code: "invalid_transition", message: "entrypoint is empty" };
  }
  return { ok: true, identity: { phase: "running", user: identity.user, entrypoint: [...entrypoint] } };
}

/** Superuser operations are only allowed while provisioning. There is no way back. */
export function requirePrivilege(identity: IdentityState, operation: string): PrivilegeCheck {
  if (identity.phase === "provisioning") return { ok: true };
  return {
    ok: false,
    code: "privilege_escalation_denied",
    message: `${operation} needs superuser rights but the image runs as ${identity.user} (${identity.phase})`,
  };
}
