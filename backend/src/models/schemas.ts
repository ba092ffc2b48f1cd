import { z } from 'zod';
import {
  APPOINTMENT_TYPES,
  ORDER_STATUSES,
  PAYMENT_METHODS,
  PLAN_PERIODS,
  PLANS,
  VEHICLE_TYPES
} from './structures';

// Form values arrive as JSON, but numbers and flags often come in as strings.
const blankToUndefined = (val: unknown) => {
  if (val === null) return undefined;
  if (typeof val === 'string' && val.trim() === '') return undefined;
  return val;
};

const toNumber = (val: unknown) => {
  const value = blankToUndefined(val);
  if (typeof value === 'string') return Number(value.trim().replace(',', '.'));
  return value;
};

const toBoolean = (val: unknown) => {
  if (typeof val === 'string') return ['1', 'true', 'on', 'yes'].includes(val.trim().toLowerCase());
  if (typeof val === 'number') return val === 1;
  return val;
};

const requiredText = (label: string) =>
  z
    .string({
      invalid_type_error: `${label} deve ser um texto.`,
      required_error: `${label} é obrigatório.`
    })
    .trim()
    .min(1, `${label} é obrigatório.`);

const optionalText = (label: string) =>
  z
    .string({ invalid_type_error: `${label} deve ser um texto.` })
    .trim()
    .nullish()
    .transform((val) => val ?? '');

const optionalEmail = (label: string) =>
  z
    .preprocess(
      blankToUndefined,
      z
        .string({ invalid_type_error: `${label} deve ser um texto.` })
        .trim()
        .email('Informe um e-mail válido.')
        .optional()
    )
    .transform((val) => val ?? '');

const requiredEmail = (label: string) =>
  z
    .string({
      invalid_type_error: `${label} deve ser um texto.`,
      required_error: `Informe ${label.toLowerCase()}.`
    })
    .trim()
    .min(1, `Informe ${label.toLowerCase()}.`)
    .email('Informe um e-mail válido.');

const money = (label: string) =>
  z.preprocess(
    toNumber,
    z
      .number({
        invalid_type_error: `${label} deve ser um número.`,
        required_error: `${label} é obrigatório.`
      })
      .finite(`${label} deve ser um número.`)
      .min(0, `${label} não pode ser negativo.`)
  );

const moneyOrZero = (label: string) =>
  z.preprocess(
    toNumber,
    z
      .number({ invalid_type_error: `${label} deve ser um número.` })
      .finite(`${label} deve ser um número.`)
      .min(0, `${label} não pode ser negativo.`)
      .default(0)
  );

const moneyOrNull = (label: string) =>
  z
    .preprocess(
      toNumber,
      z
        .number({ invalid_type_error: `${label} deve ser um número.` })
        .finite(`${label} deve ser um número.`)
        .min(0, `${label} não pode ser negativo.`)
        .optional()
    )
    .transform((val) => val ?? null);

const wholeOrNull = (label: string) =>
  z
    .preprocess(
      toNumber,
      z
        .number({ invalid_type_error: `${label} deve ser um número.` })
        .int(`${label} deve ser inteiro.`)
        .min(0, `${label} não pode ser negativo.`)
        .optional()
    )
    .transform((val) => val ?? null);

const id = (label: string) =>
  z.preprocess(
    toNumber,
    z
      .number({
        invalid_type_error: `Selecione ${label}.`,
        required_error: `Selecione ${label}.`
      })
      .int(`Selecione ${label}.`)
      .positive(`Selecione ${label}.`)
  );

const idOrNull = (label: string) =>
  z
    .preprocess(
      toNumber,
      z
        .number({ invalid_type_error: `Selecione ${label}.` })
        .int(`Selecione ${label}.`)
        .positive(`Selecione ${label}.`)
        .optional()
    )
    .transform((val) => val ?? null);

const flagWithDefault = (fallback: boolean) =>
  z.preprocess(toBoolean, z.boolean({ invalid_type_error: 'Valor inválido.' }).default(fallback));

// Dates are parsed by the services (dd/mm/yyyy or yyyy-mm-dd)
const dateText = z
  .string({ invalid_type_error: 'Data inválida.' })
  .trim()
  .nullish()
  .transform((val) => val ?? '');

const choice = <T extends string>(values: readonly T[], message: string) =>
  z.custom<T>(
    (val) => typeof val === 'string' && values.some((value) => value === val),
    { message }
  );

export const LoginSchema = z.object({
  username: requiredText('Usuário'),
  password: z.string({ required_error: 'Senha é obrigatório.' }).min(1, 'Senha é obrigatório.')
});

const PasswordPair = {
  password1: z.string({ invalid_type_error: 'Senha inválida.' }).nullish().transform((val) => val ?? ''),
  password2: z.string({ invalid_type_error: 'Senha inválida.' }).nullish().transform((val) => val ?? '')
};

export const SignupSchema = z.object({
  companyName: requiredText('Nome da empresa'),
  cnpjCpf: optionalText('CNPJ/CPF'),
  phone: optionalText('Telefone'),
  cep: optionalText('CEP'),
  street: optionalText('Rua'),
  number: optionalText('Número'),
  district: optionalText('Bairro'),
  city: optionalText('Cidade'),
  username: requiredText('Login'),
  email: requiredEmail('E-mail'),
  recoveryEmail: requiredEmail('E-mail de recuperação'),
  firstName: requiredText('Nome'),
  lastName: optionalText('Sobrenome'),
  ...PasswordPair
});

export const PasswordResetSchema = z.object({
  uid: z.string({ required_error: 'Link inválido.' }).trim(),
  token: z.string({ required_error: 'Link inválido.' }).trim(),
  ...PasswordPair
});

export const CompanySchema = z.object({
  name: requiredText('Nome da empresa'),
  cnpjCpf: optionalText('CNPJ/CPF'),
  phone: optionalText('Telefone'),
  cep: optionalText('CEP'),
  street: optionalText('Rua'),
  number: optionalText('Número'),
  district: optionalText('Bairro'),
  city: optionalText('Cidade')
});

export const LogoSchema = z.object({
  dataUrl: z.string({ invalid_type_error: 'Envie a imagem como data URL.' }).nullable()
});

export const RenewalSchema = z.object({
  period: choice(PLAN_PERIODS, 'Selecione um período válido.')
});

export const PlanPricesSchema = z.object({
  prices: z
    .array(
      z.object({
        plan: choice(PLANS, 'Plano inválido.'),
        period: choice(PLAN_PERIODS, 'Selecione um período válido.'),
        amount: money('Valor'),
        pixCopyPaste: optionalText('PIX copia e cola')
      }),
      { required_error: 'Informe os valores dos planos.' }
    )
    .min(1, 'Informe os valores dos planos.')
});

export const ApprovalSchema = z.object({
  paymentConfirmed: flagWithDefault(true),
  confirmRenewal: flagWithDefault(false)
});

export const UserSchema = z.object({
  username: requiredText('Login'),
  email: optionalEmail('E-mail'),
  recoveryEmail: optionalEmail('E-mail de recuperação'),
  recoveryPhone: optionalText('Telefone de recuperação'),
  firstName: optionalText('Nome'),
  lastName: optionalText('Sobrenome'),
  isManager: flagWithDefault(false),
  isActive: flagWithDefault(true),
  ...PasswordPair
});

export const EmployeeSchema = z.object({
  name: requiredText('Nome'),
  phone: optionalText('Telefone'),
  email: optionalEmail('E-mail'),
  joinedOn: dateText,
  active: flagWithDefault(true)
});

export const ClientSchema = z.object({
  name: requiredText('Nome'),
  phone: requiredText('Telefone'),
  email: optionalEmail('E-mail'),
  document: optionalText('Documento'),
  cep: optionalText('CEP'),
  street: optionalText('Rua'),
  number: optionalText('Número'),
  district: optionalText('Bairro'),
  city: optionalText('Cidade')
});

export const VehicleSchema = z.object({
  clientId: id('o cliente'),
  type: choice(VEHICLE_TYPES, 'Selecione o tipo do veículo.'),
  plate: requiredText('Placa')
    .transform((val) => val.toUpperCase())
    .refine((val) => val.length <= 10, 'A placa deve ter no máximo 10 caracteres.'),
  brand: requiredText('Marca'),
  model: requiredText('Modelo'),
  year: optionalText('Ano/Modelo'),
  color: optionalText('Cor'),
  km: wholeOrNull('Quilometragem')
});

export const ServiceOrderSchema = z.object({
  clientId: id('o cliente'),
  vehicleId: id('o veículo'),
  responsibleId: idOrNull('o responsável'),
  executorId: idOrNull('o executor'),
  status: z
    .preprocess(blankToUndefined, choice(ORDER_STATUSES, 'Status inválido.').optional())
    .transform((val) => val ?? 'ABERTA'),
  entryDate: dateText,
  expectedDelivery: dateText,
  problem: requiredText('Problema relatado'),
  diagnosis: optionalText('Diagnóstico'),
  labor: moneyOrZero('Mão de obra'),
  discount: moneyOrZero('Desconto'),
  notes: optionalText('Observações')
});

export const OrderItemSchema = z
  .object({
    productId: idOrNull('o produto'),
    description: optionalText('Descrição'),
    qty: money('Quantidade'),
    unitPrice: money('Valor unitário')
  })
  .refine((item) => item.productId !== null || item.description !== '', {
    message: 'Descrição é obrigatório.',
    path: ['description']
  });

export const PaymentSchema = z.object({
  method: choice(PAYMENT_METHODS, 'Forma de pagamento inválida.'),
  amount: money('Valor'),
  paidOn: dateText
});

export const ExpenseSchema = z.object({
  description: requiredText('Descrição'),
  amount: money('Valor'),
  date: dateText
});

export const AppointmentSchema = z.object({
  clientId: id('o cliente'),
  vehicleId: id('o veículo'),
  date: requiredText('Data'),
  time: optionalText('Hora'),
  type: z
    .preprocess(blankToUndefined, choice(APPOINTMENT_TYPES, 'Tipo inválido.').optional())
    .transform((val) => val ?? 'NOTA'),
  notes: optionalText('Observações')
});

export const ProductSchema = z.object({
  name: requiredText('Nome'),
  code: optionalText('Código'),
  description: optionalText('Descrição'),
  cost: moneyOrNull('Custo'),
  price: money('Preço'),
  stock: wholeOrNull('Estoque'),
  minStock: z.preprocess(
    toNumber,
    z
      .number({ invalid_type_error: 'Estoque mínimo deve ser um número.' })
      .int('Estoque mínimo deve ser inteiro.')
      .min(0, 'Estoque mínimo não pode ser negativo.')
      .default(0)
  )
});

export type LoginInput = z.input<typeof LoginSchema>;
export type SignupData = z.output<typeof SignupSchema>;
export type CompanyData = z.output<typeof CompanySchema>;
export type UserData = z.output<typeof UserSchema>;
export type EmployeeData = z.output<typeof EmployeeSchema>;
export type ClientData = z.output<typeof ClientSchema>;
export type VehicleData = z.output<typeof VehicleSchema>;
export type ServiceOrderData = z.output<typeof ServiceOrderSchema>;
export type OrderItemData = z.output<typeof OrderItemSchema>;
export type PaymentData = z.output<typeof PaymentSchema>;
export type ExpenseData = z.output<typeof ExpenseSchema>;
export type AppointmentData = z.output<typeof AppointmentSchema>;
export type ProductData = z.output<typeof ProductSchema>;
