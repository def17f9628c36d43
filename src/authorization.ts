/**
 * Gate for administrative ledger operations (fundRewards, setRewardsDuration)
 */
export interface Authorizer {
  isAdmin(identity: string): boolean;
}

/**
 * Single designated administrator
 */
export function createAdminAuthorizer(adminId: string): Authorizer {
  if (!adminId) {
    throw new Error('Admin identity must not be empty');
  }
  return {
    isAdmin: (identity: string) => identity === adminId,
  };
}
