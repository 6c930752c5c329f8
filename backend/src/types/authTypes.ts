export const ROLES = ['admin', 'student'] as const;
export type Role = (typeof ROLES)[number];

/** Identity attached to the request by the auth middleware. */
export interface AuthUser {
  id: string;
  role: Role;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}
