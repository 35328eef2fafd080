import { owned, sendResult, sendStoreError } from '../../routes/respond';
import { safeLogger } from '../../security/safeLogger';
import { PublicUser } from '../../storage/records';
import { Storage } from '../../storage/storage';

export type AdminUserView = {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
  isAdmin: boolean;
  isSelf: boolean;
};

const toView = (user: PublicUser, admins: Set<string>, selfId: string): AdminUserView => ({
  id: user.id,
  username: user.username,
  email: user.email,
  firstName: user.firstName,
  lastName: user.lastName,
  isActive: user.isActive,
  isAdmin: admins.has(user.id),
  isSelf: user.id === selfId,
});

export function adminController(storage: Storage) {
  const adminSet = async () => {
    const admins = await storage.getAllAdmins();
    return new Set(admins.success ? admins.data : []);
  };

  return {
    listUsers: owned(async (_req, res, selfId) => {
      const users = await storage.getAllUsers();
      if (!users.success) return sendStoreError(res, users.error);
      const admins = await adminSet();
      return res.json({ users: users.data.map((u) => toView(u, admins, selfId)) });
    }),

    activate: owned(async (req, res, selfId) => {
      const user = await storage.activateUser(req.params.userId);
      if (!user.success) return sendStoreError(res, user.error);
      safeLogger.info('admin.user_activated', { actor: selfId, userId: user.data.id });
      return res.json(toView(user.data, await adminSet(), selfId));
    }),

    deactivate: owned(async (req, res, selfId) => {
      if (req.params.userId === selfId) return res.status(400).json({ error: 'Cannot deactivate your own account' });
      const user = await storage.deactivateUser(req.params.userId);
      if (!user.success) return sendStoreError(res, user.error);
      safeLogger.info('admin.user_deactivated', { actor: selfId, userId: user.data.id });
      return res.json(toView(user.data, await adminSet(), selfId));
    }),

    remove: owned(async (req, res, selfId) => {
      if (req.params.userId === selfId) return res.status(400).json({ error: 'Cannot delete your own account' });
      const result = await storage.deleteUser(req.params.userId);
      if (result.success) safeLogger.info('admin.user_deleted', { actor: selfId, userId: req.params.userId });
      return sendResult(res, result, 200, () => ({ message: 'User deleted successfully' }));
    }),
  };
}
