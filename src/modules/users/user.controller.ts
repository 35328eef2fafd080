import { Mailer, activationMail } from '../../mailer';
import { handle, owned, parseOr400, sendResult, sendStoreError } from '../../routes/respond';
import { safeLogger } from '../../security/safeLogger';
import { Storage } from '../../storage/storage';
import { setSessionCookie } from './session';
import { loginSchema, passwordSchema, profileSchema, registerSchema } from './user.validators';

export type UserControllerOptions = { appUrl: string; sessionTtlSeconds: number };

export function userController(storage: Storage, mailer: Mailer, options: UserControllerOptions) {
  return {
    /** Creates an inactive account and mails the activation link. */
    register: handle(async (req, res) => {
      const body = parseOr400(res, registerSchema, req.body);
      if (!body) return;

      const registered = await storage.registerUser(body.username, body.email, body.password);
      if (!registered.success) return sendStoreError(res, registered.error);
      const user = registered.data;

      const token = await storage.createActivationToken(user.id);
      if (!token.success) return sendStoreError(res, token.error);
      try {
        await mailer.send(activationMail(user.email, options.appUrl, token.data));
      } catch (err) {
        safeLogger.error('user.activation_mail_failed', { userId: user.id, error: err });
      }

      safeLogger.info('user.registered', { userId: user.id });
      return res.status(201).json({
        message: 'Account created. Check your email to activate it.',
        user: { username: user.username, email: user.email },
      });
    }),

    login: handle(async (req, res) => {
      const body = parseOr400(res, loginSchema, req.body);
      if (!body) return;

      const login = await storage.loginUser(body.username, body.password);
      if (!login.success) {
        if (login.error.kind === 'NotFound') return res.status(401).json({ error: 'Invalid credentials' });
        return sendStoreError(res, login.error);
      }
      const user = login.data;
      if (!user.isActive) return res.status(403).json({ error: 'Account is not activated' });

      const session = await storage.createSession(user.id);
      if (!session.success) return sendStoreError(res, session.error);
      const admin = await storage.isUserAdmin(user.id);

      setSessionCookie(res, session.data, options.sessionTtlSeconds);
      safeLogger.info('user.login', { userId: user.id });
      return res.json({
        user: { username: user.username, email: user.email, isAdmin: admin.success && admin.data },
        token: session.data,
      });
    }),

    profile: owned(async (req, res, userId) => {
      const user = await storage.getUserById(userId);
      return sendResult(res, user, 200, (u) => ({ ...u, isAdmin: req.authContext?.role === 'admin' }));
    }),

    updateProfile: owned(async (req, res, userId) => {
      const body = parseOr400(res, profileSchema, req.body);
      if (!body) return;
      return sendResult(res, await storage.updateProfile(userId, body));
    }),

    changePassword: owned(async (req, res, userId) => {
      const body = parseOr400(res, passwordSchema, req.body);
      if (!body) return;
      const result = await storage.updatePassword(userId, body.password);
      return sendResult(res, result, 200, () => ({ message: 'Password updated successfully' }));
    }),
  };
}
