import { fail } from "./errors";
import {
  ZERO_ADDRESS,
  type ActionKind,
  type Address,
  type AdminAction,
  type CooldownKey,
  type ProtocolState,
  type Transition,
} from "./types";

/* ── guards ──────────────────────────────────────────────── */
export const requireOwner = (s: ProtocolState, caller: Address): void => {
  if (caller !== s.owner) fail("Unauthorized", `${caller} is not the owner`);
};

export const requireProvider = (s: ProtocolState, caller: Address): void => {
  if (!s.providers.has(caller)) fail("Unauthorized", `${caller} is not a data provider`);
};

export const requireNotPaused = (s: ProtocolState): void => {
  if (s.paused) fail("SystemPaused", "system is paused");
};

/* ── cooldown ledger ─────────────────────────────────────── */
export const cooldownKey = (kind: ActionKind, who: Address): CooldownKey => `${kind}:${who}`;

export const requireCooldown = (
  s: ProtocolState,
  kind: ActionKind,
  who: Address,
  now: bigint,
): void => {
  const last = s.cooldowns.get(cooldownKey(kind, who));
  if (last !== undefined && now < last + s.cooldownSeconds)
    fail("RateLimited", `${kind} cooldown active until ${last + s.cooldownSeconds}`);
};

export const stampCooldown = (
  s: ProtocolState,
  kind: ActionKind,
  who: Address,
  now: bigint,
): ProtocolState["cooldowns"] => new Map(s.cooldowns).set(cooldownKey(kind, who), now);

/* ── owner-only roster / switches ────────────────────────── */
export const applyAdmin = (
  s: ProtocolState,
  caller: Address,
  action: AdminAction,
): Transition => {
  requireOwner(s, caller);
  const unchanged: Transition = { next: s, events: [] };

  switch (action.type) {
    case "transferOwnership": {
      if (action.newOwner === ZERO_ADDRESS)
        fail("InvalidArgument", "new owner cannot be the zero address");
      if (action.newOwner === s.owner) return unchanged;
      return {
        next: { ...s, owner: action.newOwner },
        events: [
          { type: "OwnershipTransferred", previousOwner: s.owner, newOwner: action.newOwner },
        ],
      };
    }
    case "addProvider": {
      if (s.providers.has(action.provider)) return unchanged;
      return {
        next: { ...s, providers: new Set(s.providers).add(action.provider) },
        events: [{ type: "ProviderAdded", provider: action.provider }],
      };
    }
    case "removeProvider": {
      if (!s.providers.has(action.provider)) return unchanged;
      const providers = new Set(s.providers);
      providers.delete(action.provider);
      return {
        next: { ...s, providers },
        events: [{ type: "ProviderRemoved", provider: action.provider }],
      };
    }
    case "setPaused": {
      if (action.paused === s.paused) return unchanged;
      return {
        next: { ...s, paused: action.paused },
        events: [{ type: "PauseChanged", paused: action.paused }],
      };
    }
    case "setCooldown": {
      if (action.seconds <= 0n) fail("InvalidArgument", "cooldown must be positive");
      if (action.seconds === s.cooldownSeconds) return unchanged;
      return {
        next: { ...s, cooldownSeconds: action.seconds },
        events: [
          {
            type: "CooldownUpdated",
            previousSeconds: s.cooldownSeconds,
            newSeconds: action.seconds,
          },
        ],
      };
    }
  }
};
