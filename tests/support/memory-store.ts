// tests/support/memory-store.ts
import type {
  Booking, BookingAdditionalDriver, BookingAddOn, BookingAddOnAssignment, Invoice, IssueReport, MaintenanceRecord,
  Payment, PaymentMethod, Penalty, Promotion, Receipt, Review, SafetyEquipment, User, UserPreference, UserSession,
  Vehicle, VehicleCategory, VehicleFeature, VehicleFeatureAssignment, VehicleImage,
} from "../../src/db/schema";
import { UniqueViolationError } from "../../src/errors";
import { UNIQUE } from "../../src/store/constraints";
import type { Store } from "../../src/store/types";

type UniqueKey<T> = { constraint: string; key: (row: T) => string | null };

// drizzle's set() skips undefined values; so do we
function defined<T extends object>(patch: Partial<T>): Partial<T> {
  const out: Partial<T> = { ...patch };
  for (const key of Object.keys(out)) {
    if (Reflect.get(out, key) === undefined) Reflect.deleteProperty(out, key);
  }
  return out;
}

/** One table: rows by primary key, unique keys enforced on every write. */
class Table<T extends object> {
  private rows = new Map<string, T>();

  constructor(private readonly pk: (row: T) => string, private readonly keys: UniqueKey<T>[] = []) {}

  insert(row: T): T {
    if (this.rows.has(this.pk(row))) throw new UniqueViolationError("primary_key");
    this.check(row);
    this.rows.set(this.pk(row), { ...row });
    return { ...row };
  }

  get(id: string): T | undefined {
    const row = this.rows.get(id);
    return row ? { ...row } : undefined;
  }

  find(pred: (row: T) => boolean): T | undefined {
    return this.filter(pred)[0];
  }

  filter(pred: (row: T) => boolean = () => true): T[] {
    return [...this.rows.values()].filter(pred).map((r) => ({ ...r }));
  }

  update(id: string, patch: Partial<T>, where: (row: T) => boolean = () => true): T | undefined {
    const current = this.rows.get(id);
    if (!current || !where(current)) return undefined;
    const next: T = { ...current, ...defined(patch) };
    this.check(next);
    this.rows.set(id, next);
    return { ...next };
  }

  updateMany(ids: string[], patch: Partial<T>, where: (row: T) => boolean = () => true): number {
    let n = 0;
    for (const id of new Set(ids)) if (this.update(id, patch, where)) n++;
    return n;
  }

  snapshot() {
    const rows = new Map(this.rows);
    return () => { this.rows = rows; };
  }

  private check(row: T) {
    for (const { constraint, key } of this.keys) {
      const value = key(row);
      if (value === null) continue;
      for (const other of this.rows.values()) {
        if (this.pk(other) !== this.pk(row) && key(other) === value) throw new UniqueViolationError(constraint);
      }
    }
  }
}

const byId = <T extends { id: string }>(row: T) => row.id;
const newestFirst = <T extends { createdAt: Date }>(a: T, b: T) => b.createdAt.getTime() - a.createdAt.getTime();
const oldestFirst = <T extends { createdAt: Date }>(a: T, b: T) => a.createdAt.getTime() - b.createdAt.getTime();

/** In-process Store with the same unique keys and compare-and-set rules as the Postgres one. */
export function createMemoryStore(): Store {
  const users = new Table<User>(byId, [
    { constraint: UNIQUE.username, key: (u) => u.username },
    { constraint: UNIQUE.email, key: (u) => u.email },
    { constraint: UNIQUE.driversLicense, key: (u) => u.driversLicenseNumber },
  ]);
  const sessions = new Table<UserSession>(byId);
  const preferences = new Table<UserPreference>((p) => p.userId);
  const revoked = new Map<string, Date>();
  const categories = new Table<VehicleCategory>(byId, [{ constraint: UNIQUE.categoryName, key: (c) => c.name }]);
  const vehicles = new Table<Vehicle>(byId, [
    { constraint: UNIQUE.licensePlate, key: (v) => v.licensePlate },
    { constraint: UNIQUE.vin, key: (v) => v.vinNumber },
  ]);
  const features = new Table<VehicleFeature>(byId, [{ constraint: UNIQUE.featureName, key: (f) => f.name }]);
  const featureAssignments = new Table<VehicleFeatureAssignment>(byId, [
    { constraint: UNIQUE.vehicleFeature, key: (a) => `${a.vehicleId}:${a.featureId}` },
  ]);
  const images = new Table<VehicleImage>(byId, [
    { constraint: UNIQUE.primaryImage, key: (i) => (i.isPrimary ? i.vehicleId : null) },
  ]);
  const maintenance = new Table<MaintenanceRecord>(byId);
  const equipment = new Table<SafetyEquipment>(byId, [
    { constraint: UNIQUE.vehicleEquipment, key: (e) => `${e.vehicleId}:${e.equipmentType}` },
  ]);
  const bookings = new Table<Booking>(byId, [{ constraint: UNIQUE.bookingReference, key: (b) => b.bookingReference }]);
  const drivers = new Table<BookingAdditionalDriver>(byId, [
    { constraint: UNIQUE.bookingDriver, key: (d) => `${d.bookingId}:${d.driverId}` },
  ]);
  const addons = new Table<BookingAddOn>(byId);
  const addonAssignments = new Table<BookingAddOnAssignment>(byId, [
    { constraint: UNIQUE.bookingAddon, key: (a) => `${a.bookingId}:${a.addonId}` },
  ]);
  const paymentMethods = new Table<PaymentMethod>(byId);
  const payments = new Table<Payment>(byId, [{ constraint: UNIQUE.transactionId, key: (p) => p.transactionId }]);
  const invoices = new Table<Invoice>(byId, [{ constraint: UNIQUE.invoiceNumber, key: (i) => i.invoiceNumber }]);
  const receipts = new Table<Receipt>(byId, [
    { constraint: UNIQUE.receiptNumber, key: (r) => r.receiptNumber },
    { constraint: UNIQUE.receiptPayment, key: (r) => r.paymentId },
  ]);
  const sequences = new Map<string, number>();
  const reviews = new Table<Review>(byId, [{ constraint: UNIQUE.reviewBooking, key: (r) => r.bookingId }]);
  const promotions = new Table<Promotion>(byId, [{ constraint: UNIQUE.promotionCode, key: (p) => p.code }]);
  const issues = new Table<IssueReport>(byId, [{ constraint: UNIQUE.ticketNumber, key: (i) => i.ticketNumber }]);
  const penalties = new Table<Penalty>(byId);

  const tables = [
    users, sessions, preferences, categories, vehicles, features, featureAssignments, images, maintenance, equipment,
    bookings, drivers, addons, addonAssignments, paymentMethods, payments, invoices, receipts, reviews, promotions,
    issues, penalties,
  ];

  const store: Store = {
    users: {
      async insert(row) { return users.insert(row); },
      async findById(id) { return users.get(id); },
      async findByUsername(username) { return users.find((u) => u.username === username); },
      async findByEmail(email) { return users.find((u) => u.email === email); },
      async findByLogin(login) { return users.find((u) => u.username === login || u.email === login); },
      async update(id, patch) { return users.update(id, patch); },
      async addLoyaltyPoints(id, points) {
        const user = users.get(id);
        return user && users.update(id, { loyaltyPoints: user.loyaltyPoints + points, updatedAt: new Date() });
      },
    },
    sessions: {
      async insert(row) { return sessions.insert(row); },
      async findByUserAgent(userId, userAgent) { return sessions.find((s) => s.userId === userId && s.userAgent === userAgent); },
      async update(id, patch) { return sessions.update(id, patch); },
      async listForUser(userId) { return sessions.filter((s) => s.userId === userId); },
      async deactivateAll(userId) {
        const ids = sessions.filter((s) => s.userId === userId && s.isActive).map((s) => s.id);
        return sessions.updateMany(ids, { isActive: false });
      },
    },
    preferences: {
      async insert(row) { return preferences.insert(row); },
      async findByUser(userId) { return preferences.get(userId); },
      async update(userId, patch) { return preferences.update(userId, patch); },
    },
    revokedTokens: {
      async revoke(jti, expiresAt) {
        const now = Date.now();
        for (const [key, until] of revoked) if (until.getTime() < now) revoked.delete(key);
        if (revoked.has(jti)) return false;
        revoked.set(jti, expiresAt);
        return true;
      },
    },
    categories: {
      async insert(row) { return categories.insert(row); },
      async findById(id) { return categories.get(id); },
      async list() { return categories.filter().sort((a, b) => a.sortOrder - b.sortOrder || a.name.localeCompare(b.name)); },
    },
    vehicles: {
      async insert(row) { return vehicles.insert(row); },
      async findById(id) { return vehicles.get(id); },
      async list(filter = {}) {
        return vehicles.filter((v) =>
          (!filter.status || v.status === filter.status)
          && (!filter.categoryId || v.categoryId === filter.categoryId)
          && (filter.featured === undefined || v.isFeatured === filter.featured)
          && (!filter.activeOnly || v.isActive)
          && (filter.maxDailyRate === undefined || v.dailyRate <= filter.maxDailyRate),
        ).sort((a, b) => a.make.localeCompare(b.make) || a.model.localeCompare(b.model));
      },
      async update(id, patch) { return vehicles.update(id, patch); },
      async bulkUpdate(ids, patch) { return vehicles.updateMany(ids, patch); },
    },
    features: {
      async insert(row) { return features.insert(row); },
      async findById(id) { return features.get(id); },
      async list() { return features.filter().sort((a, b) => a.name.localeCompare(b.name)); },
      async assign(row) { return featureAssignments.insert(row); },
      async listForVehicle(vehicleId) {
        return featureAssignments.filter((a) => a.vehicleId === vehicleId).flatMap((a) => {
          const feature = features.get(a.featureId);
          return feature ? [{ ...a, feature }] : [];
        });
      },
    },
    images: {
      async insert(row) { return images.insert(row); },
      async listForVehicle(vehicleId) {
        return images.filter((i) => i.vehicleId === vehicleId).sort((a, b) => a.sortOrder - b.sortOrder);
      },
      async clearPrimary(vehicleId) {
        const ids = images.filter((i) => i.vehicleId === vehicleId && i.isPrimary).map((i) => i.id);
        images.updateMany(ids, { isPrimary: false });
      },
    },
    maintenance: {
      async insert(row) { return maintenance.insert(row); },
      async findById(id) { return maintenance.get(id); },
      async listForVehicle(vehicleId) {
        return maintenance.filter((m) => m.vehicleId === vehicleId)
          .sort((a, b) => a.scheduledDate.getTime() - b.scheduledDate.getTime());
      },
      async update(id, patch) { return maintenance.update(id, patch); },
    },
    safetyEquipment: {
      async insert(row) { return equipment.insert(row); },
      async findById(id) { return equipment.get(id); },
      async listForVehicle(vehicleId) { return equipment.filter((e) => e.vehicleId === vehicleId); },
      async update(id, patch) { return equipment.update(id, patch); },
    },
    bookings: {
      async insert(row) { return bookings.insert(row); },
      async findById(id) { return bookings.get(id); },
      async findByReference(reference) { return bookings.find((b) => b.bookingReference === reference); },
      async list(filter = {}) {
        return bookings.filter((b) =>
          (!filter.customerId || b.customerId === filter.customerId)
          && (!filter.vehicleId || b.vehicleId === filter.vehicleId)
          && (!filter.status || b.status === filter.status),
        ).sort(newestFirst);
      },
      async hasOverlap(vehicleId, start, end, statuses) {
        return bookings.find((b) =>
          b.vehicleId === vehicleId
          && statuses.includes(b.status)
          && b.pickupDate.getTime() < end.getTime()
          && b.returnDate.getTime() > start.getTime(),
        ) !== undefined;
      },
      async update(id, patch) { return bookings.update(id, patch); },
      async transition(id, from, patch) { return bookings.update(id, patch, (b) => from.includes(b.status)); },
      async bulkTransition(ids, from, patch) { return bookings.updateMany(ids, patch, (b) => from.includes(b.status)); },
      async countWithPromotion(customerId, code) {
        return bookings.filter((b) => b.customerId === customerId && b.promotionCode === code && b.status !== "cancelled").length;
      },
    },
    drivers: {
      async insert(row) { return drivers.insert(row); },
      async listForBooking(bookingId) { return drivers.filter((d) => d.bookingId === bookingId); },
    },
    addons: {
      async insert(row) { return addons.insert(row); },
      async findById(id) { return addons.get(id); },
      async list(activeOnly = false) {
        return addons.filter((a) => !activeOnly || a.isActive).sort((a, b) => a.name.localeCompare(b.name));
      },
      async assign(row) { return addonAssignments.insert(row); },
      async listAssignments(bookingId) {
        return addonAssignments.filter((a) => a.bookingId === bookingId).flatMap((a) => {
          const addon = addons.get(a.addonId);
          return addon ? [{ ...a, addon }] : [];
        });
      },
      async updateAssignment(id, patch) { return addonAssignments.update(id, patch); },
    },
    paymentMethods: {
      async insert(row) { return paymentMethods.insert(row); },
      async findById(id) { return paymentMethods.get(id); },
      async list(activeOnly = false) {
        return paymentMethods.filter((m) => !activeOnly || m.isActive).sort((a, b) => a.name.localeCompare(b.name));
      },
      async bulkUpdate(ids, patch) { return paymentMethods.updateMany(ids, patch); },
    },
    payments: {
      async insert(row) { return payments.insert(row); },
      async findById(id) { return payments.get(id); },
      async listForBooking(bookingId) { return payments.filter((p) => p.bookingId === bookingId).sort(oldestFirst); },
      async update(id, patch) { return payments.update(id, patch); },
      async transition(id, from, patch) { return payments.update(id, patch, (p) => from.includes(p.status)); },
      async bulkTransition(ids, from, patch) { return payments.updateMany(ids, patch, (p) => from.includes(p.status)); },
    },
    invoices: {
      async insert(row) { return invoices.insert(row); },
      async findById(id) { return invoices.get(id); },
      async listForBooking(bookingId) { return invoices.filter((i) => i.bookingId === bookingId).sort(oldestFirst); },
      async transition(id, from, patch, paidAmount) {
        return invoices.update(id, patch, (i) => from.includes(i.status) && (paidAmount === undefined || i.paidAmount === paidAmount));
      },
      async bulkUpdate(ids, filter, patch) {
        return invoices.updateMany(ids, patch, (i) =>
          (!filter.statusIn || filter.statusIn.includes(i.status))
          && (!filter.statusNotIn || !filter.statusNotIn.includes(i.status))
          && (!filter.dueBefore || i.dueDate < filter.dueBefore),
        );
      },
    },
    receipts: {
      async insert(row) { return receipts.insert(row); },
      async findByPaymentId(paymentId) { return receipts.find((r) => r.paymentId === paymentId); },
    },
    sequences: {
      async next(scope) {
        const value = (sequences.get(scope) ?? 0) + 1;
        sequences.set(scope, value);
        return value;
      },
    },
    reviews: {
      async insert(row) { return reviews.insert(row); },
      async findById(id) { return reviews.get(id); },
      async findByBooking(bookingId) { return reviews.find((r) => r.bookingId === bookingId); },
      async listForVehicle(vehicleId, approvedOnly) {
        return reviews.filter((r) => r.vehicleId === vehicleId && (!approvedOnly || r.isApproved)).sort(newestFirst);
      },
      async update(id, patch) { return reviews.update(id, patch); },
      async bulkUpdate(ids, patch) { return reviews.updateMany(ids, patch); },
    },
    promotions: {
      async insert(row) { return promotions.insert(row); },
      async findByCode(code) { return promotions.find((p) => p.code === code); },
      async list(publicOnly) {
        return promotions.filter((p) => !publicOnly || (p.isPublic && p.isActive)).sort(newestFirst);
      },
      async claimUsage(id) {
        const promotion = promotions.get(id);
        if (!promotion) return false;
        const claimed = promotions.update(
          id,
          { usageCount: promotion.usageCount + 1 },
          (p) => p.usageLimit === null || p.usageCount < p.usageLimit,
        );
        return claimed !== undefined;
      },
    },
    issues: {
      async insert(row) { return issues.insert(row); },
      async findById(id) { return issues.get(id); },
      async list(filter = {}) {
        return issues.filter((i) =>
          (!filter.customerId || i.customerId === filter.customerId)
          && (!filter.status || i.status === filter.status)
          && (!filter.assignedTo || i.assignedTo === filter.assignedTo),
        ).sort(newestFirst);
      },
      async update(id, patch) { return issues.update(id, patch); },
      async transition(id, from, patch) { return issues.update(id, patch, (i) => from.includes(i.status)); },
    },
    penalties: {
      async insert(row) { return penalties.insert(row); },
      async findById(id) { return penalties.get(id); },
      async listForBooking(bookingId) { return penalties.filter((p) => p.bookingId === bookingId).sort(newestFirst); },
      async listForCustomer(customerId) { return penalties.filter((p) => p.customerId === customerId).sort(newestFirst); },
      async transition(id, from, patch) { return penalties.update(id, patch, (p) => from.includes(p.status)); },
    },
    // all-or-nothing like a (nested) SQL transaction: restore every table on failure
    async transaction(fn) {
      const restore = tables.map((t) => t.snapshot());
      const savedSequences = new Map(sequences);
      const savedRevoked = new Map(revoked);
      try {
        return await fn(store);
      } catch (err) {
        for (const undo of restore) undo();
        sequences.clear();
        for (const [k, v] of savedSequences) sequences.set(k, v);
        revoked.clear();
        for (const [k, v] of savedRevoked) revoked.set(k, v);
        throw err;
      }
    },
  };
  return store;
}
