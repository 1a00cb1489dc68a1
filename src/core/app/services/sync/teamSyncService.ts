/**
 * Project: Raid Sync
 * File: src/core/app/services/sync/teamSyncService.ts
 * Summary: Teams, their rosters and race entries, and the runner registrations
 * attached to them.
 *
 * Membership changes are checked against the cached race before any remote call:
 * the roster size cap and the availability of the runner. Validation of a team for
 * a race additionally enforces the age bracket rule and the PPS form requirement.
 */

import type { Race } from '../../../domain/race';
import {
  hasRequiredDocuments,
  type RaceRegistration,
  type RegistrationUpdate,
} from '../../../domain/registration';
import { ageOn, checkTeamComposition } from '../../../domain/rules/ageRules';
import {
  nextBibNumber,
  type Team,
  type TeamDraft,
  type TeamRaceEntry,
} from '../../../domain/team';
import { displayName, type User } from '../../../domain/user';
import {
  CapacityError,
  CompositionError,
  EligibilityError,
  NotFoundError,
} from '../../errors/syncErrors';
import { registrationMapper } from '../../mappers/registrationMapper';
import {
  teamMapper,
  teamMembershipMapper,
  teamRaceEntryMapper,
} from '../../mappers/teamMapper';
import { userMapper } from '../../mappers/userMapper';
import {
  asCollection,
  asEntity,
  asObject,
  readFirst,
  readInteger,
  requireObject,
} from '../../mappers/wireValues';
import type { LocalStore } from '../../ports/localStore';
import type { JsonObject } from '../../ports/remoteClient';
import { resolveAvailability, type UserAvailability } from '../availabilityResolver';
import { scopeKey } from './keyedMutex';
import { loadRace, loadRaces, loadUser, loadUsers, storeUsers } from './localReads';
import { isLocalId } from './localIds';
import { localReferences, outboundRequest } from './outboundPayload';
import type { SyncCoordinator, SyncReadResult, SyncWriteResult } from './syncCoordinator';

const TEAMS_SCOPE = scopeKey('teams');

export const raceTeamsScope = (raceId: number): string => scopeKey('teams:race', raceId);

export const rosterScope = (teamId: number): string => scopeKey('roster', teamId);

const registrationsScope = (raceId: number): string => scopeKey('registrations:race', raceId);

export type TeamInRace = {
  team: Team;
  entry: TeamRaceEntry;
};

export type RosterMember = {
  user: User;
  registration: RaceRegistration | null;
};

export type TeamRoster = {
  team: Team;
  entry: TeamRaceEntry | null;
  members: RosterMember[];
};

const loadTeam = async (store: LocalStore, id: number): Promise<Team | null> => {
  const [row] = await store.query('teams', { id });
  return row ? teamMapper.fromLocalRow(row) : null;
};

const loadEntry = async (
  store: LocalStore,
  teamId: number,
  raceId: number,
): Promise<TeamRaceEntry | null> => {
  const [row] = await store.query('team_races', { team_id: teamId, race_id: raceId });
  return row ? teamRaceEntryMapper.fromLocalRow(row) : null;
};

const loadRegistration = async (
  store: LocalStore,
  userId: number,
  raceId: number,
): Promise<RaceRegistration | null> => {
  const [row] = await store.query('race_registrations', { user_id: userId, race_id: raceId });
  return row ? registrationMapper.fromLocalRow(row) : null;
};

const loadMemberIds = async (store: LocalStore, teamId: number): Promise<number[]> =>
  (await store.query('team_members', { team_id: teamId })).map((row) => row.user_id);

const loadTeamsInRace = async (store: LocalStore, raceId: number): Promise<TeamInRace[]> => {
  const entries = await store.query('team_races', { race_id: raceId });
  const result: TeamInRace[] = [];

  for (const row of entries) {
    const team = await loadTeam(store, row.team_id);
    if (team) {
      result.push({ team, entry: teamRaceEntryMapper.fromLocalRow(row) });
    }
  }

  return result;
};

const setEntryValidity = async (
  store: LocalStore,
  teamId: number,
  raceId: number,
  isValid: boolean,
): Promise<void> => {
  const entry = (await loadEntry(store, teamId, raceId)) ?? {
    teamId,
    raceId,
    isValid,
    finishTime: null,
    bibNumber: null,
  };
  await store.upsert('team_races', teamRaceEntryMapper.toLocalRow({ ...entry, isValid }));
};

const emptyRegistration = (userId: number, raceId: number): RaceRegistration => ({
  userId,
  raceId,
  chipNumber: null,
  finishTime: null,
  ppsForm: null,
});

export class TeamSyncService {
  constructor(private readonly coordinator: SyncCoordinator) {}

  fetchTeamsForRace(raceId: number, signal?: AbortSignal): Promise<SyncReadResult<TeamInRace[]>> {
    return this.coordinator.read<TeamInRace[]>({
      operation: 'teams.forRace',
      scope: raceTeamsScope(raceId),
      path: `/races/${raceId}/teams`,
      resource: 'Teams',
      signal,
      decode: (data) =>
        asCollection(data).map((item) => ({
          team: teamMapper.fromWireJson(item),
          entry: teamRaceEntryMapper.fromWireJson(item, raceId),
        })),
      reconcile: async (store, teams) => {
        await store.upsertMany(
          'teams',
          teams.map(({ team }) => teamMapper.toLocalRow(team)),
        );
        await store.replaceScope(
          'team_races',
          'race_id',
          raceId,
          teams.map(({ entry }) => teamRaceEntryMapper.toLocalRow({ ...entry, raceId })),
        );
      },
      readLocal: (store) => loadTeamsInRace(store, raceId),
      whenAbsent: async (store) => {
        await store.clearScope('team_races', 'race_id', raceId);
        return [];
      },
    });
  }

  fetchTeam(id: number, signal?: AbortSignal): Promise<SyncReadResult<Team | null>> {
    return this.coordinator.read<Team | null>({
      operation: 'teams.get',
      scope: TEAMS_SCOPE,
      path: `/teams/${id}`,
      resource: 'Team',
      signal,
      decode: (data) => teamMapper.fromWireJson(asEntity(data)),
      reconcile: async (store, team) => {
        if (team) {
          await store.upsert('teams', teamMapper.toLocalRow(team));
        }
      },
      readLocal: (store) => loadTeam(store, id),
      whenAbsent: async (store) => {
        await store.clearScope('team_members', 'team_id', id);
        await store.clearScope('team_races', 'team_id', id);
        await store.delete('teams', { id });
        return null;
      },
    });
  }

  /** Team, its entry in `raceId` and its members with their registration for that race. */
  fetchTeamRoster(
    teamId: number,
    raceId: number,
    signal?: AbortSignal,
  ): Promise<SyncReadResult<TeamRoster | null>> {
    return this.coordinator.read<TeamRoster | null>({
      operation: 'teams.roster',
      scope: rosterScope(teamId),
      path: `/teams/${teamId}/races/${raceId}`,
      resource: 'Team roster',
      signal,
      decode: (data) => {
        const source = requireObject(asEntity(data), 'teamRoster');
        const teamJson = source.team ?? null;
        return {
          team: teamMapper.fromWireJson(teamJson),
          entry: teamRaceEntryMapper.fromWireJson(teamJson, raceId),
          members: asCollection(source.members ?? []).map((member) => ({
            user: userMapper.fromWireJson(member),
            registration: registrationMapper.fromWireJson(member, raceId),
          })),
        };
      },
      reconcile: async (store, roster) => {
        if (!roster) {
          return;
        }

        await store.upsert('teams', teamMapper.toLocalRow(roster.team));
        if (roster.entry) {
          await store.upsert('team_races', teamRaceEntryMapper.toLocalRow(roster.entry));
        }

        await storeUsers(
          store,
          roster.members.map(({ user }) => user),
          { replaceRoles: false },
        );
        await store.replaceScope(
          'team_members',
          'team_id',
          teamId,
          roster.members.map(({ user }) =>
            teamMembershipMapper.toLocalRow({ teamId, userId: user.id }),
          ),
        );
        await store.upsertMany(
          'race_registrations',
          roster.members.flatMap(({ registration }) =>
            registration ? [registrationMapper.toLocalRow(registration)] : [],
          ),
        );
      },
      readLocal: async (store) => {
        const team = await loadTeam(store, teamId);
        if (!team) {
          return null;
        }

        const members: RosterMember[] = [];
        for (const userId of await loadMemberIds(store, teamId)) {
          const user = await loadUser(store, userId);
          if (user) {
            members.push({ user, registration: await loadRegistration(store, userId, raceId) });
          }
        }

        return { team, entry: await loadEntry(store, teamId, raceId), members };
      },
      whenAbsent: async (store) => {
        await store.delete('team_races', { team_id: teamId, race_id: raceId });
        return null;
      },
    });
  }

  createTeam(draft: TeamDraft, signal?: AbortSignal): Promise<SyncWriteResult> {
    return this.coordinator.write({
      kind: 'create',
      entity: 'team',
      operation: 'teams.create',
      action: 'team.create',
      scope: TEAMS_SCOPE,
      resource: 'Team',
      signal,
      request: outboundRequest({
        method: 'POST',
        path: '/teams',
        body: teamMapper.toCreatePayload(draft),
      }),
      applyRemote: async (store, data) => {
        const id = teamMapper.idFromWireJson(asEntity(data));
        await store.upsert('teams', teamMapper.toLocalRow({ ...draft, id }));
        return id;
      },
      applyLocal: (store, localId) =>
        store.upsert('teams', teamMapper.toLocalRow({ ...draft, id: localId })),
    });
  }

  /**
   * Enters a team in a race. The bib number is the highest cached bib plus one; a
   * confirmed registration keeps the number returned by the backend when present.
   */
  async registerTeamToRace(
    teamId: number,
    raceId: number,
    signal?: AbortSignal,
  ): Promise<SyncWriteResult> {
    return this.coordinator.locks.run(scopeKey('race-teams-capacity', raceId), async () => {
      const race = await this.requireRace(raceId);
      const entries = (await this.coordinator.store.query('team_races', { race_id: raceId })).map(
        (row) => teamRaceEntryMapper.fromLocalRow(row),
      );

      if (entries.length >= race.maxTeams) {
        throw new CapacityError(`Race ${raceId}`, race.maxTeams, entries.length);
      }

      const bibNumber = nextBibNumber(entries);
      const entry: TeamRaceEntry = { teamId, raceId, isValid: false, finishTime: null, bibNumber };

      return this.coordinator.write({
        kind: 'mutation',
        targetId: teamId,
        operation: 'teams.registerRace',
        action: 'team.registerRace',
        scope: raceTeamsScope(raceId),
        resource: 'Team entry',
        signal,
        request: outboundRequest({
          method: 'POST',
          path: '/teams/{teamId}/register-race',
          params: { teamId: { entity: 'team', id: teamId } },
          body: { RAC_ID: raceId },
          bodyRefs: localReferences({ RAC_ID: { entity: 'race', id: raceId } }),
        }),
        applyRemote: async (store, data) => {
          const response = asObject(asEntity(data));
          const assigned = response
            ? readFirst(readInteger, response, ['TER_RACE_NUMBER', 'race_number'])
            : null;
          await store.upsert(
            'team_races',
            teamRaceEntryMapper.toLocalRow({ ...entry, bibNumber: assigned ?? bibNumber }),
          );
        },
        applyLocal: (store) => store.upsert('team_races', teamRaceEntryMapper.toLocalRow(entry)),
      });
    });
  }

  async addTeamMember(
    teamId: number,
    userId: number,
    raceId: number,
    signal?: AbortSignal,
  ): Promise<SyncWriteResult> {
    return this.coordinator.locks.run(scopeKey('roster-capacity', teamId), async () => {
      const { store } = this.coordinator;
      const race = await this.requireRace(raceId);
      const user = await loadUser(store, userId);
      if (!user) {
        throw new NotFoundError('User', userId);
      }

      const memberIds = await loadMemberIds(store, teamId);
      if (memberIds.length >= race.maxTeamMembers) {
        throw new CapacityError(`Team ${teamId}`, race.maxTeamMembers, memberIds.length);
      }

      const [availability] = await this.resolveFor(race, [user]);
      if (availability && !availability.eligible) {
        throw new EligibilityError(userId, availability.reasons);
      }

      const applyMembership = async (target: LocalStore) => {
        await target.upsert(
          'team_members',
          teamMembershipMapper.toLocalRow({ teamId, userId }),
        );
        await target.upsert(
          'race_registrations',
          registrationMapper.toLocalRow(emptyRegistration(userId, raceId)),
        );
      };

      return this.coordinator.write({
        kind: 'mutation',
        targetId: teamId,
        operation: 'teams.addMember',
        action: 'team.addMember',
        scope: rosterScope(teamId),
        resource: 'Team member',
        signal,
        request: outboundRequest({
          method: 'POST',
          path: '/teams/addMember',
          body: { TEA_ID: teamId, USE_ID: userId },
          bodyRefs: localReferences({
            TEA_ID: { entity: 'team', id: teamId },
            USE_ID: { entity: 'user', id: userId },
          }),
        }),
        applyRemote: applyMembership,
        applyLocal: applyMembership,
      });
    });
  }

  removeTeamMember(
    teamId: number,
    userId: number,
    raceId: number,
    signal?: AbortSignal,
  ): Promise<SyncWriteResult> {
    const removeLocally = async (store: LocalStore) => {
      await store.delete('team_members', { team_id: teamId, user_id: userId });
      await store.delete('race_registrations', { user_id: userId, race_id: raceId });
    };

    return this.coordinator.write({
      kind: 'mutation',
      targetId: teamId,
      operation: 'teams.removeMember',
      action: 'team.removeMember',
      scope: rosterScope(teamId),
      resource: 'Team member',
      signal,
      request: outboundRequest({
        method: 'POST',
        path: '/teams/member/remove',
        body: { TEA_ID: teamId, USE_ID: userId },
        bodyRefs: localReferences({
          TEA_ID: { entity: 'team', id: teamId },
          USE_ID: { entity: 'user', id: userId },
        }),
      }),
      applyRemote: removeLocally,
      applyLocal: removeLocally,
    });
  }

  async deleteTeam(id: number, signal?: AbortSignal): Promise<SyncWriteResult> {
    const removeLocally = async (store: LocalStore) => {
      await store.clearScope('team_members', 'team_id', id);
      await store.clearScope('team_races', 'team_id', id);
      await store.delete('teams', { id });
    };

    if (isLocalId(id)) {
      await this.coordinator.discardUnsyncedEntity('team', id);
      await this.coordinator.locks.run(TEAMS_SCOPE, () => removeLocally(this.coordinator.store));
      return { id, confirmed: true, outboundEntryId: null };
    }

    return this.coordinator.write({
      kind: 'mutation',
      targetId: id,
      operation: 'teams.delete',
      action: 'team.delete',
      scope: TEAMS_SCOPE,
      resource: 'Team',
      signal,
      request: outboundRequest({
        method: 'DELETE',
        path: '/teams/{id}',
        params: { id: { entity: 'team', id } },
      }),
      applyRemote: removeLocally,
      applyLocal: removeLocally,
    });
  }

  /**
   * Marks a team as valid for a race once its cached roster satisfies the member
   * bounds, the age bracket rule and the document requirement.
   */
  async validateTeamForRace(
    teamId: number,
    raceId: number,
    signal?: AbortSignal,
  ): Promise<SyncWriteResult> {
    const { store } = this.coordinator;
    const race = await this.requireRace(raceId);
    const memberIds = await loadMemberIds(store, teamId);
    const members = await loadUsers(store);
    const roster = members.filter((user) => memberIds.includes(user.id));

    if (roster.length < race.minTeamMembers || roster.length > race.maxTeamMembers) {
      throw new CompositionError(
        'team-size',
        roster.length < race.minTeamMembers ? 'below-minimum-members' : 'above-maximum-members',
        `Teams in this race need between ${race.minTeamMembers} and ${race.maxTeamMembers} members.`,
      );
    }

    const now = this.coordinator.now();
    const ages: number[] = [];
    for (const user of roster) {
      if (!user.birthDate) {
        throw new CompositionError(
          'unknown-age',
          'missing-birth-date',
          `${displayName(user)} has no birth date on record.`,
        );
      }
      ages.push(ageOn(user.birthDate, now));
    }

    const composition = checkTeamComposition(race.ageThresholds, ages);
    if (!composition.ok) {
      throw new CompositionError('team-age-bracket', composition.reason, composition.message);
    }

    for (const user of roster) {
      const registration = await loadRegistration(store, user.id, raceId);
      if (!hasRequiredDocuments(user.licenceNumber, registration)) {
        throw new CompositionError(
          'required-documents',
          'missing-pps-form',
          `${displayName(user)} has no licence and no PPS form for this race.`,
        );
      }
    }

    return this.writeValidity(teamId, raceId, true, signal);
  }

  invalidateTeamForRace(
    teamId: number,
    raceId: number,
    signal?: AbortSignal,
  ): Promise<SyncWriteResult> {
    return this.writeValidity(teamId, raceId, false, signal);
  }

  async updateRegistration(
    userId: number,
    raceId: number,
    update: RegistrationUpdate,
    signal?: AbortSignal,
  ): Promise<SyncWriteResult> {
    const current =
      (await loadRegistration(this.coordinator.store, userId, raceId)) ??
      emptyRegistration(userId, raceId);
    const next: RaceRegistration = {
      ...current,
      chipNumber: update.chipNumber === undefined ? current.chipNumber : update.chipNumber,
      ppsForm: update.ppsForm === undefined ? current.ppsForm : update.ppsForm,
    };

    const body: JsonObject = { USE_ID: userId, RAC_ID: raceId };
    if (update.ppsForm !== undefined) {
      body.USR_PPS_FORM = update.ppsForm;
    }
    if (update.chipNumber !== undefined) {
      body.USR_CHIP_NUMBER = update.chipNumber;
    }

    const apply = (target: LocalStore) =>
      target.upsert('race_registrations', registrationMapper.toLocalRow(next));

    return this.coordinator.write({
      kind: 'mutation',
      targetId: userId,
      operation: 'registrations.update',
      action: 'registration.update',
      scope: registrationsScope(raceId),
      resource: 'Registration',
      signal,
      request: outboundRequest({
        method: 'POST',
        path: '/teams/member/update-info',
        body,
        bodyRefs: localReferences({
          USE_ID: { entity: 'user', id: userId },
          RAC_ID: { entity: 'race', id: raceId },
        }),
      }),
      applyRemote: apply,
      applyLocal: apply,
    });
  }

  /** Users who may still join a team for the race; offline, computed from the cache. */
  fetchAvailableUsers(raceId: number, signal?: AbortSignal): Promise<SyncReadResult<User[]>> {
    return this.coordinator.read<User[]>({
      operation: 'teams.availableUsers',
      scope: raceTeamsScope(raceId),
      path: `/races/${raceId}/available-users`,
      resource: 'Available users',
      signal,
      decode: (data) => asCollection(data).map((item) => userMapper.fromWireJson(item)),
      reconcile: (store, users) => storeUsers(store, users, { replaceRoles: false }),
      readLocal: async (store) => {
        const race = await loadRace(store, raceId);
        if (!race) {
          return [];
        }

        const users = await loadUsers(store);
        const eligible = new Set(
          (await this.resolveFor(race, users))
            .filter((availability) => availability.eligible)
            .map((availability) => availability.userId),
        );
        return users.filter((user) => eligible.has(user.id));
      },
      whenAbsent: async () => [],
    });
  }

  /** Availability of `candidates` (every cached user by default) for a cached race. */
  async resolveAvailabilityLocally(
    raceId: number,
    candidates?: readonly User[],
  ): Promise<UserAvailability[]> {
    const race = await this.requireRace(raceId);
    return this.resolveFor(race, candidates ?? (await loadUsers(this.coordinator.store)));
  }

  private async resolveFor(race: Race, candidates: readonly User[]): Promise<UserAvailability[]> {
    const { store } = this.coordinator;
    const [entries, memberships, registrations, races] = await Promise.all([
      store.query('team_races'),
      store.query('team_members'),
      store.query('race_registrations'),
      loadRaces(store),
    ]);

    return resolveAvailability({
      race,
      candidates,
      teamEntries: entries.map((row) => teamRaceEntryMapper.fromLocalRow(row)),
      memberships: memberships.map((row) => teamMembershipMapper.fromLocalRow(row)),
      registrations: registrations.map((row) => registrationMapper.fromLocalRow(row)),
      races,
      now: this.coordinator.now(),
    });
  }

  private async requireRace(raceId: number): Promise<Race> {
    const race = await loadRace(this.coordinator.store, raceId);
    if (!race) {
      throw new NotFoundError('Race', raceId);
    }

    return race;
  }

  private writeValidity(
    teamId: number,
    raceId: number,
    isValid: boolean,
    signal?: AbortSignal,
  ): Promise<SyncWriteResult> {
    const apply = (store: LocalStore) => setEntryValidity(store, teamId, raceId, isValid);

    return this.coordinator.write({
      kind: 'mutation',
      targetId: teamId,
      operation: isValid ? 'teams.validate' : 'teams.invalidate',
      action: isValid ? 'team.validate' : 'team.invalidate',
      scope: raceTeamsScope(raceId),
      resource: 'Team entry',
      signal,
      request: outboundRequest({
        method: 'POST',
        path: isValid ? '/teams/validate-race' : '/teams/unvalidate-race',
        body: { TEA_ID: teamId, RAC_ID: raceId },
        bodyRefs: localReferences({
          TEA_ID: { entity: 'team', id: teamId },
          RAC_ID: { entity: 'race', id: raceId },
        }),
      }),
      applyRemote: apply,
      applyLocal: apply,
    });
  }
}
