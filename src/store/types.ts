// src/store/types.ts
import type {
  Booking, BookingAdditionalDriver, BookingAddOn, BookingAddOnAssignment, BookingStatus, Invoice, InvoiceStatus,
  IssueReport, IssueStatus, MaintenanceRecord, Payment, PaymentMethod, PaymentStatus, Penalty, PenaltyStatus,
  Promotion, Receipt, Review, SafetyEquipment, User, UserPreference, UserSession, Vehicle, VehicleCategory,
  VehicleFeature, VehicleFeatureAssignment, VehicleImage, VehicleStatus,
} from "../db/schema";
import type { SequenceSource } from "../domain/identifiers";

/**
 * Persistence seams used by the services. Writes that hit a unique key
 * reject with UniqueViolationError naming the constraint (see ./constraints).
 * `transition` methods are compare-and-set: they only touch the row while
 * its status is still one of `from`, and resolve undefined otherwise.
 */

export type Patch<T> = Partial<Omit<T, "id">>;

export interface UserRepository {
  insert(row: User): Promise<User>;
  findById(id: string): Promise<User | undefined>;
  findByUsername(username: string): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  /** username or email */
  findByLogin(login: string): Promise<User | undefined>;
  update(id: string, patch: Patch<User>): Promise<User | undefined>;
  addLoyaltyPoints(id: string, points: number): Promise<User | undefined>;
}

export interface SessionRepository {
  insert(row: UserSession): Promise<UserSession>;
  findByUserAgent(userId: string, userAgent: string): Promise<UserSession | undefined>;
  update(id: string, patch: Patch<UserSession>): Promise<UserSession | undefined>;
  listForUser(userId: string): Promise<UserSession[]>;
  deactivateAll(userId: string): Promise<number>;
}

export interface PreferenceRepository {
  insert(row: UserPreference): Promise<UserPreference>;
  findByUser(userId: string): Promise<UserPreference | undefined>;
  update(userId: string, patch: Partial<Omit<UserPreference, "userId">>): Promise<UserPreference | undefined>;
}

export interface RevokedTokenRepository {
  /**
   * Blacklists `jti` until `expiresAt`; false when it was already blacklisted.
   * Rows whose token has expired are dropped on the way in.
   */
  revoke(jti: string, expiresAt: Date): Promise<boolean>;
}

export interface CategoryRepository {
  insert(row: VehicleCategory): Promise<VehicleCategory>;
  findById(id: string): Promise<VehicleCategory | undefined>;
  list(): Promise<VehicleCategory[]>;
}

export type VehicleFilter = {
  status?: VehicleStatus;
  categoryId?: string;
  featured?: boolean;
  activeOnly?: boolean;
  maxDailyRate?: number;
};

export interface VehicleRepository {
  insert(row: Vehicle): Promise<Vehicle>;
  findById(id: string): Promise<Vehicle | undefined>;
  list(filter?: VehicleFilter): Promise<Vehicle[]>;
  update(id: string, patch: Patch<Vehicle>): Promise<Vehicle | undefined>;
  bulkUpdate(ids: string[], patch: Patch<Vehicle>): Promise<number>;
}

export type FeatureAssignmentView = VehicleFeatureAssignment & { feature: VehicleFeature };

export interface FeatureRepository {
  insert(row: VehicleFeature): Promise<VehicleFeature>;
  findById(id: string): Promise<VehicleFeature | undefined>;
  list(): Promise<VehicleFeature[]>;
  assign(row: VehicleFeatureAssignment): Promise<VehicleFeatureAssignment>;
  listForVehicle(vehicleId: string): Promise<FeatureAssignmentView[]>;
}

export interface ImageRepository {
  insert(row: VehicleImage): Promise<VehicleImage>;
  listForVehicle(vehicleId: string): Promise<VehicleImage[]>;
  clearPrimary(vehicleId: string): Promise<void>;
}

export interface MaintenanceRepository {
  insert(row: MaintenanceRecord): Promise<MaintenanceRecord>;
  findById(id: string): Promise<MaintenanceRecord | undefined>;
  listForVehicle(vehicleId: string): Promise<MaintenanceRecord[]>;
  update(id: string, patch: Patch<MaintenanceRecord>): Promise<MaintenanceRecord | undefined>;
}

export interface SafetyEquipmentRepository {
  insert(row: SafetyEquipment): Promise<SafetyEquipment>;
  findById(id: string): Promise<SafetyEquipment | undefined>;
  listForVehicle(vehicleId: string): Promise<SafetyEquipment[]>;
  update(id: string, patch: Patch<SafetyEquipment>): Promise<SafetyEquipment | undefined>;
}

export type BookingFilter = {
  customerId?: string;
  vehicleId?: string;
  status?: BookingStatus;
};

export interface BookingRepository {
  insert(row: Booking): Promise<Booking>;
  findById(id: string): Promise<Booking | undefined>;
  findByReference(reference: string): Promise<Booking | undefined>;
  list(filter?: BookingFilter): Promise<Booking[]>;
  /** any booking of the vehicle in `statuses` whose range intersects [start, end) */
  hasOverlap(vehicleId: string, start: Date, end: Date, statuses: readonly BookingStatus[]): Promise<boolean>;
  update(id: string, patch: Patch<Booking>): Promise<Booking | undefined>;
  transition(id: string, from: readonly BookingStatus[], patch: Patch<Booking>): Promise<Booking | undefined>;
  bulkTransition(ids: string[], from: readonly BookingStatus[], patch: Patch<Booking>): Promise<number>;
  countWithPromotion(customerId: string, code: string): Promise<number>;
}

export interface AdditionalDriverRepository {
  insert(row: BookingAdditionalDriver): Promise<BookingAdditionalDriver>;
  listForBooking(bookingId: string): Promise<BookingAdditionalDriver[]>;
}

export type AddonAssignmentView = BookingAddOnAssignment & { addon: BookingAddOn };

export interface AddOnRepository {
  insert(row: BookingAddOn): Promise<BookingAddOn>;
  findById(id: string): Promise<BookingAddOn | undefined>;
  list(activeOnly?: boolean): Promise<BookingAddOn[]>;
  assign(row: BookingAddOnAssignment): Promise<BookingAddOnAssignment>;
  listAssignments(bookingId: string): Promise<AddonAssignmentView[]>;
  updateAssignment(id: string, patch: Patch<BookingAddOnAssignment>): Promise<BookingAddOnAssignment | undefined>;
}

export interface PaymentMethodRepository {
  insert(row: PaymentMethod): Promise<PaymentMethod>;
  findById(id: string): Promise<PaymentMethod | undefined>;
  list(activeOnly?: boolean): Promise<PaymentMethod[]>;
  bulkUpdate(ids: string[], patch: Patch<PaymentMethod>): Promise<number>;
}

export interface PaymentRepository {
  insert(row: Payment): Promise<Payment>;
  findById(id: string): Promise<Payment | undefined>;
  listForBooking(bookingId: string): Promise<Payment[]>;
  update(id: string, patch: Patch<Payment>): Promise<Payment | undefined>;
  transition(id: string, from: readonly PaymentStatus[], patch: Patch<Payment>): Promise<Payment | undefined>;
  bulkTransition(ids: string[], from: readonly PaymentStatus[], patch: Patch<Payment>): Promise<number>;
}

export type InvoiceBulkFilter = {
  statusIn?: readonly InvoiceStatus[];
  statusNotIn?: readonly InvoiceStatus[];
  /** ISO date; only invoices due strictly before it */
  dueBefore?: string;
};

export interface InvoiceRepository {
  insert(row: Invoice): Promise<Invoice>;
  findById(id: string): Promise<Invoice | undefined>;
  listForBooking(bookingId: string): Promise<Invoice[]>;
  /** also guarded on `paidAmount` when given, so concurrent payments cannot overwrite each other */
  transition(id: string, from: readonly InvoiceStatus[], patch: Patch<Invoice>, paidAmount?: number): Promise<Invoice | undefined>;
  bulkUpdate(ids: string[], filter: InvoiceBulkFilter, patch: Patch<Invoice>): Promise<number>;
}

export interface ReceiptRepository {
  insert(row: Receipt): Promise<Receipt>;
  findByPaymentId(paymentId: string): Promise<Receipt | undefined>;
}

export type SequenceRepository = SequenceSource;

export interface ReviewRepository {
  insert(row: Review): Promise<Review>;
  findById(id: string): Promise<Review | undefined>;
  findByBooking(bookingId: string): Promise<Review | undefined>;
  listForVehicle(vehicleId: string, approvedOnly: boolean): Promise<Review[]>;
  update(id: string, patch: Patch<Review>): Promise<Review | undefined>;
  bulkUpdate(ids: string[], patch: Patch<Review>): Promise<number>;
}

export interface PromotionRepository {
  insert(row: Promotion): Promise<Promotion>;
  findByCode(code: string): Promise<Promotion | undefined>;
  list(publicOnly: boolean): Promise<Promotion[]>;
  /** count one use unless the usage limit is already reached */
  claimUsage(id: string): Promise<boolean>;
}

export type IssueFilter = { customerId?: string; status?: IssueStatus; assignedTo?: string };

export interface IssueRepository {
  insert(row: IssueReport): Promise<IssueReport>;
  findById(id: string): Promise<IssueReport | undefined>;
  list(filter?: IssueFilter): Promise<IssueReport[]>;
  update(id: string, patch: Patch<IssueReport>): Promise<IssueReport | undefined>;
  transition(id: string, from: readonly IssueStatus[], patch: Patch<IssueReport>): Promise<IssueReport | undefined>;
}

export interface PenaltyRepository {
  insert(row: Penalty): Promise<Penalty>;
  findById(id: string): Promise<Penalty | undefined>;
  listForBooking(bookingId: string): Promise<Penalty[]>;
  listForCustomer(customerId: string): Promise<Penalty[]>;
  transition(id: string, from: readonly PenaltyStatus[], patch: Patch<Penalty>): Promise<Penalty | undefined>;
}

export interface Store {
  users: UserRepository;
  sessions: SessionRepository;
  preferences: PreferenceRepository;
  revokedTokens: RevokedTokenRepository;
  categories: CategoryRepository;
  vehicles: VehicleRepository;
  features: FeatureRepository;
  images: ImageRepository;
  maintenance: MaintenanceRepository;
  safetyEquipment: SafetyEquipmentRepository;
  bookings: BookingRepository;
  drivers: AdditionalDriverRepository;
  addons: AddOnRepository;
  paymentMethods: PaymentMethodRepository;
  payments: PaymentRepository;
  invoices: InvoiceRepository;
  receipts: ReceiptRepository;
  sequences: SequenceRepository;
  reviews: ReviewRepository;
  promotions: PromotionRepository;
  issues: IssueRepository;
  penalties: PenaltyRepository;
  /** run `fn` against a store whose writes commit or roll back together */
  transaction<T>(fn: (store: Store) => Promise<T>): Promise<T>;
}
