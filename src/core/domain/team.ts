export type Team = {
  id: number;
  managerId: number;
  name: string;
  image: string | null;
};

export type TeamDraft = Omit<Team, 'id'>;

export type TeamMembership = {
  teamId: number;
  userId: number;
};

export type TeamRaceEntry = {
  teamId: number;
  raceId: number;
  isValid: boolean;
  finishTime: string | null;
  /** Dossard number, assigned in registration order. */
  bibNumber: number | null;
};

export const nextBibNumber = (entries: readonly Pick<TeamRaceEntry, 'bibNumber'>[]): number =>
  entries.reduce((highest, entry) => Math.max(highest, entry.bibNumber ?? 0), 0) + 1;
