export type Raid = {
  id: number;
  clubId: number;
  addressId: number;
  managerId: number;
  name: string;
  email: string | null;
  phoneNumber: string | null;
  website: string | null;
  image: string | null;
  startsAt: Date;
  endsAt: Date;
  registrationOpensAt: Date;
  registrationClosesAt: Date;
  /** Upper bound on the number of races that may be attached to the raid. */
  maxRaces: number;
};

export type RaidDraft = Omit<Raid, 'id'>;

export type RaidStatus = 'upcoming' | 'in-progress' | 'finished';

export const isRaidInProgress = (raid: Raid, now: Date): boolean =>
  now.getTime() >= raid.startsAt.getTime() && now.getTime() <= raid.endsAt.getTime();

export const isRaidUpcoming = (raid: Raid, now: Date): boolean =>
  now.getTime() < raid.startsAt.getTime();

export const isRaidFinished = (raid: Raid, now: Date): boolean =>
  now.getTime() > raid.endsAt.getTime();

export const isRaidRegistrationOpen = (raid: Raid, now: Date): boolean =>
  now.getTime() >= raid.registrationOpensAt.getTime() &&
  now.getTime() <= raid.registrationClosesAt.getTime();

export const getRaidStatus = (raid: Raid, now: Date): RaidStatus => {
  if (isRaidUpcoming(raid, now)) {
    return 'upcoming';
  }

  return isRaidFinished(raid, now) ? 'finished' : 'in-progress';
};
