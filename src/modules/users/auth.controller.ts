import { Mailer, passwordResetMail } from '../../mailer';
import { handle, owned, parseOr400, sendResult, sendStoreError } from '../../routes/respond';
import { safeLogger } from '../../security/safeLogger';
import { sessionTokenOf } from '../../auth/sessionAdapter';
import { Storage } from '../../storage/storage';
import { clearSessionCookie, setSessionCookie } from './session';
import { passwordSchema, resetRequestSchema, tokenSchema } from './user.validators';

export type AuthControllerOptions = { appUrl: string; sessionTtlSeconds: number };

const RESET_REQUESTED = 'If an account exists with that email, you will receive a password reset link.';

export function authController(storage: Storage, mailer: Mailer, options: AuthControllerOptions) {
  return {
    /** Answers the same way whether or not the address is known. */
    requestReset: handle(async (req, res) => {
      const body = parseOr400(res, resetRequestSchema, req.body);
      if (!body) return;

      const user = await storage.getUserByEmail(body.email);
      if (!user.success) {
        if (user.error.kind !== 'NotFound') safeLogger.error('auth.reset_lookup_failed', { error: user.error });
        return res.json({ message: RESET_REQUESTED });
      }

      const token = await storage.createPasswordResetToken(user.data.id);
      if (!token.success) return sendStoreError(res, token.error);
      try {
        await mailer.send(passwordResetMail(user.data.email, options.appUrl, token.data));
      } catch (err) {
        safeLogger.error('auth.reset_mail_failed', { userId: user.data.id, error: err });
      }
      return res.json({ message: RESET_REQUESTED });
    }),

    /**
     * Consumes the reset token and hands back a session, with which the client sets the
     * new password through /auth/updatePassword.
     */
    verifyReset: handle(async (req, res) => {
      const body = parseOr400(res, tokenSchema, req.body);
      if (!body) return;

      const owner = await storage.verifyPasswordResetToken(body.token);
      if (!owner.success) return sendStoreError(res, owner.error);
      const session = await storage.createSession(owner.data.userId);
      if (!session.success) return sendStoreError(res, session.error);

      return res.json({ username: owner.data.username, token: session.data });
    }),

    updatePassword: owned(async (req, res, userId) => {
      const body = parseOr400(res, passwordSchema, req.body);
      if (!body) return;
      const result = await storage.updatePassword(userId, body.password);
      return sendResult(res, result, 200, () => ({ message: 'Password updated successfully' }));
    }),

    activate: handle(async (req, res) => {
      const body = parseOr400(res, tokenSchema, req.body);
      if (!body) return;

      const userId = await storage.verifyActivationToken(body.token);
      if (!userId.success) {
        if (userId.error.kind === 'NotFound') return res.status(404).json({ error: 'Invalid or expired activation token' });
        return sendStoreError(res, userId.error);
      }
      const user = await storage.activateUser(userId.data);
      if (!user.success) return sendStoreError(res, user.error);
      const session = await storage.createSession(user.data.id);
      if (!session.success) return sendStoreError(res, session.error);

      setSessionCookie(res, session.data, options.sessionTtlSeconds);
      safeLogger.info('user.activated', { userId: user.data.id });
      return res.json({
        message: 'Account activated successfully',
        user: { username: user.data.username, email: user.data.email },
        token: session.data,
      });
    }),

    logout: handle(async (req, res) => {
      const token = sessionTokenOf(req);
      if (token) {
        const revoked = await storage.revokeSession(token);
        if (!revoked.success) return sendStoreError(res, revoked.error);
      }
      clearSessionCookie(res);
      return res.json({ message: 'Logged out successfully' });
    }),
  };
}
