export type RaceRegistration = {
  userId: number;
  raceId: number;
  chipNumber: number | null;
  finishTime: string | null;
  /** Reference to the uploaded PPS health form. */
  ppsForm: string | null;
};

export type RegistrationUpdate = Partial<Pick<RaceRegistration, 'chipNumber' | 'ppsForm'>>;

/** Runners without a licence number must provide a PPS form. */
export const hasRequiredDocuments = (
  licenceNumber: string | null,
  registration: Pick<RaceRegistration, 'ppsForm'> | null,
): boolean => {
  if (licenceNumber && licenceNumber.trim().length > 0) {
    return true;
  }

  return Boolean(registration?.ppsForm && registration.ppsForm.trim().length > 0);
};
