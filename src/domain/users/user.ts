import { Auditable, AuditView, toAuditView } from '../audit.js';

/**
 * User account record. Accounts are registered through the identity
 * provider; this service reads and edits their profile data.
 */
export interface User extends Auditable {
  readonly id: string;
  email: string;
  userName: string | null;
  firstName: string | null;
  lastName: string | null;
  profilePicture: string | null;
  isActive: boolean;
  lastLoginDate: Date | null;
}

export function fullName(user: Pick<User, 'firstName' | 'lastName'>): string {
  return `${user.firstName ?? ''} ${user.lastName ?? ''}`.trim();
}

export function displayName(user: Pick<User, 'firstName' | 'lastName' | 'email' | 'userName'>): string {
  const name = fullName(user);
  if (name !== '') {
    return name;
  }
  return user.email || user.userName || 'Unknown User';
}

export interface UserView extends AuditView {
  id: string;
  email: string;
  userName: string | null;
  firstName: string | null;
  lastName: string | null;
  profilePicture: string | null;
  isActive: boolean;
  lastLoginDate?: string;
  displayName: string;
}

export function toUserView(user: User): UserView {
  return {
    id: user.id,
    email: user.email,
    userName: user.userName,
    firstName: user.firstName,
    lastName: user.lastName,
    profilePicture: user.profilePicture,
    isActive: user.isActive,
    lastLoginDate: user.lastLoginDate?.toISOString(),
    displayName: displayName(user),
    ...toAuditView(user),
  };
}
