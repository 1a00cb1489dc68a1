export type LocalIdGenerator = {
  next(): number;
};

export const isLocalId = (id: number): boolean => id < 0;

/**
 * Ids are `-epochMs`, decremented further when two are issued in the same
 * millisecond, so they never collide with positive server ids or with each other.
 */
export const createLocalIdGenerator = (clock: () => Date = () => new Date()): LocalIdGenerator => {
  let lastIssued = 0;

  return {
    next() {
      const candidate = -clock().getTime();
      lastIssued = candidate < lastIssued ? candidate : lastIssued - 1;
      return lastIssued;
    },
  };
};
