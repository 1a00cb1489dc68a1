export type Address = {
  id: number;
  postalCode: string;
  city: string;
  streetName: string;
  streetNumber: string;
};

export type AddressDraft = Omit<Address, 'id'>;
