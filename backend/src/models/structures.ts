
// Plans and billing periods
export type Plan = 'BASICO' | 'PLUS';
export type PlanPeriod = '30d' | '6m' | '12m';

export const PLANS: readonly Plan[] = ['BASICO', 'PLUS'];
export const PLAN_PERIODS: readonly PlanPeriod[] = ['30d', '6m', '12m'];

// Tenant
export interface Company {
  id: number;
  name: string;
  cnpjCpf: string;
  phone: string;
  cep: string;
  street: string;
  number: string;
  district: string;
  city: string;
  logo: string | null;        // data URL
  plan: Plan;
  planPeriod: PlanPeriod;
  planUpdatedAt: string | null;   // (ISO format)
  planExpiresAt: string | null;   // (ISO format)
  isActive: boolean;
  paymentConfirmed: boolean;
  renewalPeriod: PlanPeriod | '';
  renewalRequestedAt: string | null;
  createdAt: string;
}

export interface PlanSummary {
  plan: Plan;
  period: PlanPeriod;
  updatedAt: string | null;
  expiresAt: string | null;
  daysToExpiry: number | null;
  expired: boolean;
  userLimit: number;
  managerLimit: number;
}

export interface PlanPrice {
  id: number;
  plan: Plan;
  period: PlanPeriod;
  amount: number;
  pixCopyPaste: string;
  updatedAt: string;
}

export interface User {
  id: number;
  companyId: number | null;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  recoveryEmail: string;
  recoveryPhone: string;
  isManager: boolean;
  isSuperuser: boolean;
  isActive: boolean;
  dateJoined: string;
}

// Who is calling: resolved from the bearer token on each request
export interface Actor {
  user: User;
  company: Company | null;
  isManager: boolean;
}

// Actor bound to a tenant; every tenant query filters by company.id
export interface TenantActor extends Actor {
  company: Company;
}

export interface Employee {
  id: number;
  companyId: number;
  name: string;
  phone: string;
  email: string;
  joinedOn: string;
  active: boolean;
  createdAt: string;
}

export interface Client {
  id: number;
  companyId: number;
  name: string;
  phone: string;
  email: string;
  document: string;
  cep: string;
  street: string;
  number: string;
  district: string;
  city: string;
  createdAt: string;
}

export type VehicleType = 'MOTO' | 'CARRO' | 'CAMINHAO';
export const VEHICLE_TYPES: readonly VehicleType[] = ['MOTO', 'CARRO', 'CAMINHAO'];

export interface Vehicle {
  id: number;
  companyId: number;
  clientId: number;
  type: VehicleType;
  plate: string;
  brand: string;
  model: string;
  year: string;
  color: string;
  km: number | null;
  createdAt: string;
}

export type AppointmentType = 'ENTREGA' | 'RETIRADA' | 'NOTA';
export const APPOINTMENT_TYPES: readonly AppointmentType[] = ['ENTREGA', 'RETIRADA', 'NOTA'];
export const APPOINTMENT_TYPE_LABELS: Record<AppointmentType, string> = {
  ENTREGA: 'Entrega (deixar)',
  RETIRADA: 'Retirada (buscar)',
  NOTA: 'Anotação'
};

export interface Appointment {
  id: number;
  companyId: number;
  clientId: number;
  vehicleId: number;
  date: string;
  time: string | null;       // HH:MM, null = all day
  type: AppointmentType;
  notes: string;
  createdAt: string;
}

export interface Product {
  id: number;
  companyId: number;
  name: string;
  code: string;
  description: string;
  cost: number | null;
  price: number;
  stock: number | null;
  minStock: number;
}

export type OrderStatus = 'ABERTA' | 'EXECUCAO' | 'AGUARDANDO_PECA' | 'FINALIZADA' | 'CANCELADA';
export const ORDER_STATUSES: readonly OrderStatus[] = [
  'ABERTA',
  'EXECUCAO',
  'AGUARDANDO_PECA',
  'FINALIZADA',
  'CANCELADA'
];
export const ORDER_STATUS_LABELS: Record<OrderStatus, string> = {
  ABERTA: 'Aberta',
  EXECUCAO: 'Em Execução',
  AGUARDANDO_PECA: 'Aguardando Peça',
  FINALIZADA: 'Finalizada',
  CANCELADA: 'Cancelada'
};

export interface ServiceOrder {
  id: number;
  companyId: number;
  clientId: number;
  vehicleId: number;
  responsibleId: number | null;
  executorId: number | null;
  createdById: number | null;
  finishedById: number | null;
  status: OrderStatus;
  entryDate: string;
  expectedDelivery: string | null;
  startedAt: string | null;
  finishedAt: string | null;
  problem: string;
  diagnosis: string;
  labor: number;
  discount: number;
  notes: string;
  createdAt: string;
}

export interface OrderTotals {
  itemsTotal: number;
  total: number;
  paidTotal: number;
  balance: number;
}

export type OrderLogAction = 'CRIAR' | 'ATRIBUIR' | 'INICIAR' | 'FINALIZAR' | 'CANCELAR' | 'EDITAR';

export interface OrderLog {
  id: number;
  companyId: number;
  orderId: number;
  userId: number | null;
  action: OrderLogAction;
  note: string;
  createdAt: string;
}

export interface OrderItem {
  id: number;
  companyId: number;
  orderId: number;
  productId: number | null;
  description: string;
  qty: number;
  unitPrice: number;
  subtotal: number;
}

export type PaymentMethod =
  | 'Cartão de Débito'
  | 'Cartão de Crédito'
  | 'Dinheiro'
  | 'PIX'
  | 'Cheque'
  | 'Outro';
export const PAYMENT_METHODS: readonly PaymentMethod[] = [
  'Cartão de Débito',
  'Cartão de Crédito',
  'Dinheiro',
  'PIX',
  'Cheque',
  'Outro'
];

export interface Payment {
  id: number;
  companyId: number;
  orderId: number;
  method: PaymentMethod;
  amount: number;
  paidOn: string;
}

export interface Expense {
  id: number;
  companyId: number;
  description: string;
  amount: number;
  date: string;
}

// Paged list envelope
export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pages: number;
}

export type ServiceErrorCode =
  | 'VALIDATION_ERROR'
  | 'COMPANY_REQUIRED'
  | 'CSV_INVALID'
  | 'INVALID_RESET_TOKEN'
  | 'STOCK_NOT_DEFINED'
  | 'INVALID_QUANTITY'
  | 'UNAUTHENTICATED'
  | 'INVALID_CREDENTIALS'
  | 'FORBIDDEN'
  | 'MANAGER_REQUIRED'
  | 'SUPERUSER_REQUIRED'
  | 'PAYMENT_PENDING'
  | 'COMPANY_INACTIVE'
  | 'NOT_FOUND'
  | 'ACCOUNT_NOT_FOUND'
  | 'COMPANY_NOT_FOUND'
  | 'USER_NOT_FOUND'
  | 'EMPLOYEE_NOT_FOUND'
  | 'CLIENT_NOT_FOUND'
  | 'VEHICLE_NOT_FOUND'
  | 'APPOINTMENT_NOT_FOUND'
  | 'PRODUCT_NOT_FOUND'
  | 'ORDER_NOT_FOUND'
  | 'DUPLICATE_USERNAME'
  | 'DUPLICATE_EMAIL'
  | 'DUPLICATE_LICENSE_PLATE'
  | 'DUPLICATE_PRODUCT_NAME'
  | 'PLATE_OWNED_BY_OTHER_CLIENT'
  | 'SCHEDULE_CONFLICT'
  | 'USER_LIMIT_REACHED'
  | 'MANAGER_LIMIT_REACHED'
  | 'CANNOT_DEACTIVATE_SELF'
  | 'INSUFFICIENT_STOCK'
  | 'EMAIL_SEND_FAILED'
  | 'EMAIL_NOT_CONFIGURED'
  | 'INTERNAL_ERROR';

export type ServiceError = {
  code: ServiceErrorCode;
  message: string;
  details?: string[];
};

export type Ok<T> = { ok: true; data: T };
export type Err = { ok: false; error: ServiceError };
export type Result<T> = Ok<T> | Err;
