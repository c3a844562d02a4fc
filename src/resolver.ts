import { uuidFromRng, type Rng } from "./random";
import type { DeviceRole, PatientProfile, ResolvedIdentity } from "./types";

export type ResolveOptions = {
  requested: number;
  /** `null` or an empty list both mean "no profiles supplied". */
  profiles: PatientProfile[] | null;
  role: DeviceRole;
  devicePrefix: string;
  useAllProfiles: boolean;
  /** Only consumed for identifiers that have to be synthesized. */
  rng: Rng;
};

export type ResolveResult = {
  identities: ResolvedIdentity[];
  warnings: string[];
};

/** `SPK-001`, `WEAR-042`, ... (1-based). */
export function positionalDeviceId(prefix: string, index: number): string {
  return `${prefix}-${String(index + 1).padStart(3, "0")}`;
}

/**
 * Reconciles the requested patient count with the supplied profiles.
 *
 * Resolved count is `min(requested, available)`, or `available` under
 * `useAllProfiles`. Identity order always follows profile order.
 */
export function resolveIdentities(opts: ResolveOptions): ResolveResult {
  const { requested, role, devicePrefix, rng } = opts;
  const warnings: string[] = [];

  if (!opts.profiles || opts.profiles.length === 0) {
    const identities: ResolvedIdentity[] = [];
    for (let i = 0; i < requested; i += 1) {
      identities.push({
        index: i,
        patientId: uuidFromRng(rng),
        deviceId: positionalDeviceId(devicePrefix, i),
        profile: null,
      });
    }
    return { identities, warnings };
  }

  const available = opts.profiles.length;
  let count = Math.min(requested, available);
  if (opts.useAllProfiles) {
    count = available;
  } else if (requested > available) {
    warnings.push(
      `Requested ${requested} patients but only ${available} profiles available; using ${available}.`
    );
  }

  const identities = opts.profiles.slice(0, count).map((profile, i) => {
    let patientId = profile.patient_id;
    if (!patientId) {
      patientId = uuidFromRng(rng);
      warnings.push(
        `Profile at index ${i} has no patient_id; assigned ${patientId}.`
      );
    }

    let deviceId = profile.device_ids?.[role];
    if (!deviceId) {
      deviceId = positionalDeviceId(devicePrefix, i);
      warnings.push(
        `Patient ${patientId} has no ${role} device id; using ${deviceId}.`
      );
    }

    return { index: i, patientId, deviceId, profile };
  });

  return { identities, warnings };
}
