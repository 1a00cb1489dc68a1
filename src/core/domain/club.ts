export type Club = {
  id: number;
  /** Responsible user. */
  managerId: number;
  addressId: number;
  name: string;
};

export type ClubDraft = Omit<Club, 'id'>;
