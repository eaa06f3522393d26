import { err, ok, type Result } from '@stakebook/shared';
import type { LedgerErrorCode } from '../domain/errors';
import type { ManualStakerProfile } from '../domain/types';
import { createLedgerDependencies, type LedgerServiceDependencies } from './dependencies';

export type ManualStakerInput = {
  name: string;
  contactInfo?: string | null;
  notes?: string | null;
};

export type ManualStakerPatch = Partial<ManualStakerInput>;

type ProfileResult<T> = Promise<Result<T, LedgerErrorCode>>;

function optionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}

function nameKey(name: string): string {
  return name.trim().toLowerCase();
}

function byName(a: ManualStakerProfile, b: ManualStakerProfile): number {
  return nameKey(a.name).localeCompare(nameKey(b.name));
}

/** Off-app stakers a player tracks by name and contact details. */
export class ManualStakerService {
  private readonly deps: LedgerServiceDependencies;

  constructor(deps: LedgerServiceDependencies) {
    this.deps = deps;
  }

  private ownerLockKey(ownerId: string): string {
    return `manual-stakers:${ownerId}`;
  }

  private async hasNameClash(ownerId: string, name: string, exceptId?: string): Promise<boolean> {
    const profiles = await this.deps.manualStakers.listProfilesForOwner(ownerId);
    return profiles.some(
      (profile) => profile.profileId !== exceptId && nameKey(profile.name) === nameKey(name),
    );
  }

  private async persist(
    operation: string,
    profile: ManualStakerProfile,
  ): ProfileResult<ManualStakerProfile> {
    try {
      await this.deps.manualStakers.saveProfile(profile);
      return ok(profile);
    } catch (error) {
      this.deps.logger.error(
        { err: error, operation, profileId: profile.profileId },
        'ledger.persist.failed',
      );
      return err('PERSIST_FAILED');
    }
  }

  async createProfile(
    ownerId: string,
    input: ManualStakerInput,
  ): ProfileResult<ManualStakerProfile> {
    const name = input.name.trim();
    if (name.length === 0) {
      return err('INVALID_STAKER_NAME');
    }

    return this.deps.lock.withLock(this.ownerLockKey(ownerId), async () => {
      if (await this.hasNameClash(ownerId, name)) {
        return err('DUPLICATE_STAKER_PROFILE');
      }

      const nowIso = this.deps.clock.now().toISOString();
      return this.persist('createProfile', {
        profileId: this.deps.ids.randomUUID(),
        ownerId,
        name,
        contactInfo: optionalText(input.contactInfo),
        notes: optionalText(input.notes),
        createdAt: nowIso,
        lastUpdatedAt: nowIso,
      });
    });
  }

  /** Omitted fields keep their value; `null` or blank clears contact info and notes. */
  async updateProfile(
    profileId: string,
    actorId: string,
    patch: ManualStakerPatch,
  ): ProfileResult<ManualStakerProfile> {
    const name = patch.name?.trim();
    if (name !== undefined && name.length === 0) {
      return err('INVALID_STAKER_NAME');
    }

    const existing = await this.deps.manualStakers.getProfile(profileId);
    if (!existing) {
      return err('STAKER_PROFILE_NOT_FOUND');
    }
    if (existing.ownerId !== actorId) {
      return err('FORBIDDEN');
    }

    return this.deps.lock.withLock(this.ownerLockKey(existing.ownerId), async () => {
      const current = await this.deps.manualStakers.getProfile(profileId);
      if (!current) {
        return err('STAKER_PROFILE_NOT_FOUND');
      }
      if (name !== undefined && (await this.hasNameClash(current.ownerId, name, profileId))) {
        return err('DUPLICATE_STAKER_PROFILE');
      }

      return this.persist('updateProfile', {
        ...current,
        name: name ?? current.name,
        contactInfo:
          patch.contactInfo === undefined ? current.contactInfo : optionalText(patch.contactInfo),
        notes: patch.notes === undefined ? current.notes : optionalText(patch.notes),
        lastUpdatedAt: this.deps.clock.now().toISOString(),
      });
    });
  }

  /** Stakes keep the staker's name on record, so they still display after the profile is gone. */
  async deleteProfile(profileId: string, actorId: string): ProfileResult<void> {
    const existing = await this.deps.manualStakers.getProfile(profileId);
    if (!existing) {
      return err('STAKER_PROFILE_NOT_FOUND');
    }
    if (existing.ownerId !== actorId) {
      return err('FORBIDDEN');
    }

    try {
      await this.deps.manualStakers.deleteProfile(profileId);
    } catch (error) {
      this.deps.logger.error(
        { err: error, operation: 'deleteProfile', profileId },
        'ledger.persist.failed',
      );
      return err('PERSIST_FAILED');
    }
    return ok(undefined);
  }

  async getProfile(profileId: string): ProfileResult<ManualStakerProfile> {
    const profile = await this.deps.manualStakers.getProfile(profileId);
    return profile ? ok(profile) : err('STAKER_PROFILE_NOT_FOUND');
  }

  async listProfiles(ownerId: string): Promise<ManualStakerProfile[]> {
    const profiles = await this.deps.manualStakers.listProfilesForOwner(ownerId);
    return profiles.sort(byName);
  }

  /** Case-insensitive match on name or contact info; a blank query lists everything. */
  async searchProfiles(ownerId: string, query: string): Promise<ManualStakerProfile[]> {
    const needle = query.trim().toLowerCase();
    const profiles = await this.listProfiles(ownerId);
    if (needle.length === 0) {
      return profiles;
    }
    return profiles.filter(
      (profile) =>
        profile.name.toLowerCase().includes(needle) ||
        (profile.contactInfo?.toLowerCase().includes(needle) ?? false),
    );
  }
}

export function createManualStakerService(
  overrides: Partial<LedgerServiceDependencies> = {},
): ManualStakerService {
  return new ManualStakerService(createLedgerDependencies(overrides));
}
