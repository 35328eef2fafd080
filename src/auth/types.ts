export type AuthSource = 'session';
export type Role = 'user' | 'admin';

export type AuthContext = {
  userId: string;
  username: string;
  role: Role;
  sessionId: string;
  source: AuthSource;
};

declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
    }
  }
}
