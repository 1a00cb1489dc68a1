export const ROLE_TAGS = [
  'runner',
  'site-manager',
  'club-manager',
  'raid-manager',
  'race-manager',
] as const;

export type RoleTag = (typeof ROLE_TAGS)[number];

/** ISO calendar date (`YYYY-MM-DD`) without a time component. */
export type CalendarDate = string;

export type User = {
  id: number;
  addressId: number;
  clubId: number | null;
  email: string;
  firstName: string;
  lastName: string;
  licenceNumber: string | null;
  phoneNumber: string | null;
  birthDate: CalendarDate | null;
  membershipDate: CalendarDate | null;
  /** Canonical order of `ROLE_TAGS`, without duplicates. */
  roles: RoleTag[];
};

export type UserProfileUpdate = Partial<
  Pick<
    User,
    'email' | 'firstName' | 'lastName' | 'licenceNumber' | 'phoneNumber' | 'birthDate' | 'clubId'
  >
>;

export const normaliseRoles = (roles: Iterable<RoleTag>): RoleTag[] => {
  const present = new Set(roles);
  return ROLE_TAGS.filter((tag) => present.has(tag));
};

export const displayName = (user: Pick<User, 'firstName' | 'lastName'>): string =>
  `${user.firstName} ${user.lastName}`.trim();
