/**
 * Project: Raid Sync
 * File: src/core/app/services/availabilityResolver.ts
 * Summary: Eligibility of users to join a team for a given race.
 *
 * A user is eligible when they are not already on a team entered in the race (nor
 * individually registered to it), are not registered to another race whose time
 * window intersects this one, and are at least the race's minimum age. The age
 * bracket rule for the whole roster is checked separately at team validation.
 */

import { raceWindowsOverlap, type Race } from '../../domain/race';
import type { RaceRegistration } from '../../domain/registration';
import { ageOn } from '../../domain/rules/ageRules';
import type { TeamMembership, TeamRaceEntry } from '../../domain/team';
import type { User } from '../../domain/user';
import type { AvailabilityReason } from '../errors/syncErrors';

export type AvailabilityInput = {
  race: Race;
  candidates: readonly User[];
  /** Team entries; only those for `race` are considered. */
  teamEntries: readonly TeamRaceEntry[];
  memberships: readonly TeamMembership[];
  registrations: readonly RaceRegistration[];
  /** Races the registrations point to; unknown races cannot conflict. */
  races: readonly Race[];
  now: Date;
};

export type UserAvailability = {
  userId: number;
  eligible: boolean;
  /** Primary reason, in the order alreadyInTeam, hasOverlappingRace, invalidAge. */
  reason: AvailabilityReason | null;
  reasons: AvailabilityReason[];
  age: number | null;
};

export const resolveAvailability = (input: AvailabilityInput): UserAvailability[] => {
  const { race, now } = input;

  const enteredTeams = new Set(
    input.teamEntries.filter((entry) => entry.raceId === race.id).map((entry) => entry.teamId),
  );
  const usersInRace = new Set(
    input.memberships
      .filter((membership) => enteredTeams.has(membership.teamId))
      .map((membership) => membership.userId),
  );
  for (const registration of input.registrations) {
    if (registration.raceId === race.id) {
      usersInRace.add(registration.userId);
    }
  }

  const racesById = new Map(input.races.map((candidate) => [candidate.id, candidate]));
  const conflictingUsers = new Set(
    input.registrations
      .filter((registration) => {
        if (registration.raceId === race.id) {
          return false;
        }

        const other = racesById.get(registration.raceId);
        return other !== undefined && raceWindowsOverlap(race, other);
      })
      .map((registration) => registration.userId),
  );

  return input.candidates.map((user) => {
    const age = user.birthDate ? ageOn(user.birthDate, now) : null;
    const reasons: AvailabilityReason[] = [];

    if (usersInRace.has(user.id)) {
      reasons.push('alreadyInTeam');
    }

    if (conflictingUsers.has(user.id)) {
      reasons.push('hasOverlappingRace');
    }

    if (age === null || age < race.ageThresholds.minimum) {
      reasons.push('invalidAge');
    }

    return {
      userId: user.id,
      eligible: reasons.length === 0,
      reason: reasons[0] ?? null,
      reasons,
      age,
    };
  });
};
