export type RaceType = 'competitive' | 'leisure';

export type RaceGender = 'male' | 'female' | 'mixed';

/**
 * Ordered age thresholds (minimum < autonomous < supervisor).
 *
 * Members younger than `autonomous` must be at least `minimum` and the team then
 * needs a member aged `supervisor` or more.
 */
export type AgeThresholds = {
  minimum: number;
  autonomous: number;
  supervisor: number;
};

export type Race = {
  id: number;
  raidId: number;
  managerId: number;
  name: string;
  startsAt: Date;
  endsAt: Date;
  type: RaceType;
  difficulty: string;
  minParticipants: number;
  maxParticipants: number;
  minTeams: number;
  maxTeams: number;
  minTeamMembers: number;
  maxTeamMembers: number;
  ageThresholds: AgeThresholds;
  gender: RaceGender;
  chipMandatory: boolean;
};

export type RaceDraft = Omit<Race, 'id'>;

export const raceWindowsOverlap = (
  left: Pick<Race, 'startsAt' | 'endsAt'>,
  right: Pick<Race, 'startsAt' | 'endsAt'>,
): boolean =>
  left.startsAt.getTime() < right.endsAt.getTime() &&
  right.startsAt.getTime() < left.endsAt.getTime();
