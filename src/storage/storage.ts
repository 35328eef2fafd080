import { AdherenceService } from '../modules/adherence/adherence.service';
import { DosageHistoryService } from '../modules/dosageHistory/dosageHistory.service';
import { MedicineService, DEFAULT_LOW_STOCK_THRESHOLD } from '../modules/medicines/medicine.service';
import { MedicineInput } from '../modules/medicines/medicine.validators';
import { ScheduleService } from '../modules/schedules/schedule.service';
import { ScheduleInput } from '../modules/schedules/schedule.validators';
import { IdentityService, ProfileUpdate } from '../modules/users/identity.service';
import { TokenService } from '../modules/users/tokens.service';
import { StorageContext } from './context';
import { StoreFailure, StoreResult, capture, storeErrors } from './errors';
import {
  DailySchedule,
  DosageHistory,
  Medicine,
  MedicineWithExpiry,
  PublicUser,
  Schedule,
  WeeklyAdherence,
  toPublicUser,
} from './records';

export type ResetTokenOwner = { userId: string; username: string };
export type SessionUser = { user: PublicUser; isAdmin: boolean; sessionId: string };

/**
 * The contract routes call. Every operation resolves to a {@link StoreResult}; none
 * rejects.
 */
export class Storage {
  readonly medicines: MedicineService;
  readonly schedules: ScheduleService;
  readonly histories: DosageHistoryService;
  readonly aggregates: AdherenceService;
  readonly identity: IdentityService;
  readonly tokens: TokenService;

  constructor(private readonly ctx: StorageContext) {
    this.medicines = new MedicineService(ctx);
    this.schedules = new ScheduleService(ctx);
    this.histories = new DosageHistoryService(ctx);
    this.aggregates = new AdherenceService(ctx, this.medicines, this.schedules, this.histories);
    this.identity = new IdentityService(ctx);
    this.tokens = new TokenService(ctx);
  }

  getMedicine(ownerId: string, id: string): Promise<StoreResult<Medicine>> {
    return capture('Failed to get medicine', () => this.medicines.get(ownerId, id));
  }

  createMedicine(ownerId: string, input: MedicineInput): Promise<StoreResult<Medicine>> {
    return capture('Failed to create medicine', () => this.medicines.create(ownerId, input));
  }

  updateMedicine(ownerId: string, id: string, input: MedicineInput): Promise<StoreResult<Medicine>> {
    return capture('Failed to update medicine', () => this.medicines.update(ownerId, id, input));
  }

  deleteMedicine(ownerId: string, id: string): Promise<StoreResult<void>> {
    return capture('Failed to delete medicine', () => this.medicines.delete(ownerId, id));
  }

  getAllMedicines(ownerId: string): Promise<StoreResult<Medicine[]>> {
    return capture('Failed to list medicines', () => this.medicines.list(ownerId));
  }

  addStock(ownerId: string, medicineId: string, amount: number): Promise<StoreResult<Medicine>> {
    return capture('Failed to add stock', () => this.medicines.addStock(ownerId, medicineId, amount));
  }

  getLowStockMedicines(ownerId: string, threshold = DEFAULT_LOW_STOCK_THRESHOLD): Promise<StoreResult<Medicine[]>> {
    return capture('Failed to list low stock medicines', () => this.medicines.lowStock(ownerId, threshold));
  }

  getSchedule(ownerId: string, id: string): Promise<StoreResult<Schedule>> {
    return capture('Failed to get schedule', () => this.schedules.get(ownerId, id));
  }

  createSchedule(ownerId: string, input: ScheduleInput): Promise<StoreResult<Schedule>> {
    return capture('Failed to create schedule', () => this.schedules.create(ownerId, input));
  }

  updateSchedule(ownerId: string, id: string, input: ScheduleInput): Promise<StoreResult<Schedule>> {
    return capture('Failed to update schedule', () => this.schedules.update(ownerId, id, input));
  }

  deleteSchedule(ownerId: string, id: string): Promise<StoreResult<void>> {
    return capture('Failed to delete schedule', () => this.schedules.delete(ownerId, id));
  }

  getAllSchedules(ownerId: string): Promise<StoreResult<Schedule[]>> {
    return capture('Failed to list schedules', () => this.schedules.list(ownerId));
  }

  createDosageHistory(
    ownerId: string,
    medicineId: string,
    amount: number,
    scheduledTime?: string,
    when?: string
  ): Promise<StoreResult<DosageHistory>> {
    return capture('Failed to create dosage history', () =>
      this.histories.record(ownerId, medicineId, amount, { scheduledTime, when })
    );
  }

  deleteDosageHistory(ownerId: string, historyId: string): Promise<StoreResult<void>> {
    return capture('Failed to delete dosage history', () => this.histories.delete(ownerId, historyId));
  }

  getAllDosageHistories(ownerId: string): Promise<StoreResult<DosageHistory[]>> {
    return capture('Failed to list dosage histories', () => this.histories.list(ownerId));
  }

  getDosageHistoriesInDateRange(ownerId: string, start: Date, end: Date): Promise<StoreResult<DosageHistory[]>> {
    return capture('Failed to list dosage histories', () => this.histories.inRange(ownerId, start, end));
  }

  getDailySchedule(ownerId: string): Promise<StoreResult<DailySchedule>> {
    return capture('Failed to build daily schedule', () => this.aggregates.dailySchedule(ownerId));
  }

  getWeeklyAdherence(ownerId: string): Promise<StoreResult<WeeklyAdherence>> {
    return capture('Failed to compute weekly adherence', () => this.aggregates.weeklyAdherence(ownerId));
  }

  medicineExpiry(ownerId: string, asOf?: Date): Promise<StoreResult<MedicineWithExpiry[]>> {
    return capture('Failed to compute medicine expiry', () => this.aggregates.medicineExpiry(ownerId, asOf));
  }

  registerUser(username: string, email: string, password: string): Promise<StoreResult<PublicUser>> {
    return capture('Failed to register user', async () => toPublicUser(await this.identity.register(username, email, password)));
  }

  loginUser(username: string, password: string): Promise<StoreResult<PublicUser>> {
    return capture('Failed to log in', async () => toPublicUser(await this.identity.login(username, password)));
  }

  getUser(username: string): Promise<StoreResult<PublicUser>> {
    return capture('Failed to get user', async () => toPublicUser(await this.identity.getByUsername(username)));
  }

  getUserById(userId: string): Promise<StoreResult<PublicUser>> {
    return capture('Failed to get user', async () => toPublicUser(await this.identity.getById(userId)));
  }

  getUserByEmail(email: string): Promise<StoreResult<PublicUser>> {
    return capture('Failed to get user', async () => toPublicUser(await this.identity.getByEmail(email)));
  }

  updatePassword(userId: string, password: string): Promise<StoreResult<PublicUser>> {
    return capture('Failed to update password', async () => toPublicUser(await this.identity.updatePassword(userId, password)));
  }

  updateProfile(userId: string, profile: ProfileUpdate): Promise<StoreResult<PublicUser>> {
    return capture('Failed to update profile', async () => toPublicUser(await this.identity.updateProfile(userId, profile)));
  }

  activateUser(userId: string): Promise<StoreResult<PublicUser>> {
    return capture('Failed to activate user', async () => toPublicUser(await this.identity.setActive(userId, true)));
  }

  deactivateUser(userId: string): Promise<StoreResult<PublicUser>> {
    return capture('Failed to deactivate user', async () => toPublicUser(await this.identity.setActive(userId, false)));
  }

  getAllUsers(): Promise<StoreResult<PublicUser[]>> {
    return capture('Failed to list users', async () => (await this.identity.listUsers()).map(toPublicUser));
  }

  isUserAdmin(userId: string): Promise<StoreResult<boolean>> {
    return capture('Failed to check admin membership', () => this.identity.isAdmin(userId));
  }

  getAllAdmins(): Promise<StoreResult<string[]>> {
    return capture('Failed to list admins', () => this.identity.listAdmins());
  }

  grantAdmin(userId: string): Promise<StoreResult<void>> {
    return capture('Failed to grant admin', () => this.identity.grantAdmin(userId));
  }

  deleteUser(userId: string): Promise<StoreResult<void>> {
    return capture('Failed to delete user', () => this.identity.delete(userId));
  }

  createPasswordResetToken(userId: string): Promise<StoreResult<string>> {
    return capture('Failed to create password reset token', () => this.tokens.createPasswordResetToken(userId));
  }

  /** Consumes the token and resolves its owner. */
  verifyPasswordResetToken(token: string): Promise<StoreResult<ResetTokenOwner>> {
    return capture('Failed to verify password reset token', async () => {
      const userId = await this.tokens.consumePasswordResetToken(token);
      const user = await this.identity.getById(userId);
      return { userId, username: user.username };
    });
  }

  createActivationToken(userId: string): Promise<StoreResult<string>> {
    return capture('Failed to create activation token', () => this.tokens.createActivationToken(userId));
  }

  /** Consumes the token; resolves the user id it was issued for. */
  verifyActivationToken(token: string): Promise<StoreResult<string>> {
    return capture('Failed to verify activation token', () => this.tokens.consumeActivationToken(token));
  }

  createSession(userId: string): Promise<StoreResult<string>> {
    return capture('Failed to create session', () => this.tokens.createSession(userId));
  }

  /** Inactive or deleted accounts do not resolve. */
  resolveSession(token: string): Promise<StoreResult<SessionUser>> {
    return capture('Failed to resolve session', async () => {
      const userId = await this.tokens.resolveSession(token);
      const user = await this.identity.getById(userId).catch((err: unknown) => {
        if (err instanceof StoreFailure && err.error.kind === 'NotFound') return undefined;
        throw err;
      });
      if (!user || !user.isActive) throw new StoreFailure(storeErrors.notFound('Invalid or expired session'));
      const isAdmin = await this.identity.isAdmin(userId);
      return { user: toPublicUser(user), isAdmin, sessionId: token };
    });
  }

  revokeSession(token: string): Promise<StoreResult<boolean>> {
    return capture('Failed to revoke session', () => this.tokens.revokeSession(token));
  }

  ping(): Promise<boolean> {
    return this.ctx.store.ping();
  }

  close(): Promise<void> {
    return this.ctx.store.close();
  }
}
