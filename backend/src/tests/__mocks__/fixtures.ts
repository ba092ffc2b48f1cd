import { AppConfig, parseConfig } from '../../config';
import { Db, openDatabase } from '../../db/database';
import { Company, Plan, TenantActor, User } from '../../models/structures';
import { insertClient } from '../../services/clientService';
import { insertCompany, NewCompany } from '../../services/companyService';
import { EmailMessage, Mailer, SendOutcome } from '../../services/emailService';
import { insertUser, isManagerUser, NewUser } from '../../services/userService';
import { insertVehicle } from '../../services/vehicleService';

export const TEST_PASSWORD = 'senha-teste-1';

export function freshDb(): Db {
  return openDatabase(':memory:');
}

export const testConfig = (overrides: Record<string, unknown> = {}): AppConfig =>
  parseConfig({
    SECRET_KEY: 'test-secret',
    ALLOWED_HOSTS: '127.0.0.1 localhost',
    CONTACT_EMAIL: 'suporte@example.test',
    PUBLIC_URL: 'http://oficina.test',
    ...overrides
  });

/** Records every message; `failWith` turns the next sends into failures. */
export class FakeMailer implements Mailer {
  readonly sent: EmailMessage[] = [];
  failWith: string | null = null;

  constructor(public readonly configured: boolean = true) {}

  async send(message: EmailMessage): Promise<SendOutcome> {
    this.sent.push(message);
    if (this.failWith !== null) return { ok: false, detail: this.failWith, status: 422 };
    return { ok: true, detail: null, status: 200 };
  }
}

export function seedCompany(db: Db, overrides: Partial<NewCompany> = {}): Company {
  return insertCompany(db, {
    name: 'Oficina Teste',
    cnpjCpf: '',
    phone: '11 3333-4444',
    cep: '01310-100',
    street: '',
    number: '',
    district: '',
    city: 'São Paulo',
    logo: null,
    plan: 'BASICO',
    planPeriod: '30d',
    planUpdatedAt: null,
    planExpiresAt: null,
    isActive: true,
    paymentConfirmed: true,
    renewalPeriod: '',
    renewalRequestedAt: null,
    ...overrides
  });
}

export function seedUser(db: Db, company: Company | null, overrides: Partial<NewUser> & { username: string }): User {
  return insertUser(db, {
    companyId: company ? company.id : null,
    password: TEST_PASSWORD,
    ...overrides
  });
}

export const tenantOf = (user: User, company: Company): TenantActor => ({
  user,
  company,
  isManager: isManagerUser(user)
});

/** Company with one manager, ready for tenant calls */
export function seedTenant(db: Db, name = 'Oficina Teste', plan: Plan = 'BASICO') {
  const company = seedCompany(db, { name, plan });
  const manager = seedUser(db, company, { username: `gerente-${company.id}`, isManager: true });
  return { company, manager, actor: tenantOf(manager, company) };
}

export function seedClientWithVehicle(db: Db, actor: TenantActor, name = 'MARIA SILVA', plate = 'ABC1D23') {
  const client = insertClient(db, actor, { name, phone: '11988887777' });
  const vehicle = insertVehicle(db, actor, {
    clientId: client.id,
    type: 'CARRO',
    plate,
    brand: 'Fiat',
    model: 'Uno',
    year: '2010',
    color: ''
  });
  return { client, vehicle };
}
