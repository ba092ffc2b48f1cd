import { jsPDF } from 'jspdf';
import { Db } from '../db/database';
import { Company, Result, TenantActor } from '../models/structures';
import logger from '../modules/logger';
import { brazilianDate, dateOf, getTimeZone } from '../utils/dates';
import { formatMoney } from '../utils/text';
import { getOrderDetail, OrderDetail } from './serviceOrderService';
import { ok } from './common';

const LEFT = 14;
const RIGHT = 196;
const PAGE_BOTTOM = 280;

const LOGO_FORMATS: Record<string, string> = { png: 'PNG', jpeg: 'JPEG', jpg: 'JPEG' };

const companyAddress = (company: Company): string =>
  [
    [company.street, company.number].filter(Boolean).join(', '),
    company.district,
    company.city,
    company.cep
  ]
    .filter(Boolean)
    .join(' - ');

const dateTimeLabel = (instant: string): string => {
  const time = new Intl.DateTimeFormat('pt-BR', {
    timeZone: getTimeZone(),
    hour: '2-digit',
    minute: '2-digit'
  }).format(new Date(instant));
  return `${brazilianDate(dateOf(instant))} ${time}`;
};

function drawLogo(doc: jsPDF, company: Company): boolean {
  const match = /^data:image\/(png|jpeg|jpg);base64,/.exec(company.logo ?? '');
  if (!match || !company.logo) return false;
  try {
    doc.addImage(company.logo, LOGO_FORMATS[match[1]], LEFT, 10, 28, 28);
    return true;
  } catch (e) {
    logger.warn('logo not rendered on order pdf', { companyId: company.id, error: String(e) });
    return false;
  }
}

/** Renders the printable order sheet. Returns the PDF bytes. */
export function renderOrderPdf(company: Company, detail: OrderDetail, generatedAt: string): Buffer {
  const { order, items, payments } = detail;
  const doc = new jsPDF();
  let y = 18;

  const row = (cells: [string, number][], size = 10) => {
    if (y > PAGE_BOTTOM) {
      doc.addPage();
      y = 18;
    }
    doc.setFontSize(size);
    for (const [text, x] of cells) doc.text(text, x, y);
    y += size * 0.5 + 1;
  };
  const line = (text: string, x = LEFT, size = 10) => row([[text, x]], size);
  const paragraph = (text: string) => {
    const wrapped: string[] = doc.splitTextToSize(text, RIGHT - LEFT);
    for (const part of wrapped) line(part);
  };
  const rule = () => {
    doc.line(LEFT, y - 3, RIGHT, y - 3);
    y += 3;
  };

  // Header
  const headerX = drawLogo(doc, company) ? LEFT + 34 : LEFT;
  line(company.name, headerX, 16);
  if (company.cnpjCpf) line(`CNPJ/CPF: ${company.cnpjCpf}`, headerX);
  if (company.phone) line(`Telefone: ${company.phone}`, headerX);
  const address = companyAddress(company);
  if (address) line(address, headerX);
  y = Math.max(y, 44);
  rule();

  line(`Ordem de Serviço #${order.id}`, LEFT, 14);
  line(`Status: ${order.statusLabel}`);
  line(`Entrada: ${brazilianDate(order.entryDate)}`);
  if (order.expectedDelivery) line(`Previsão de entrega: ${brazilianDate(order.expectedDelivery)}`);
  line(`Cliente: ${order.clientName} (${order.clientPhone})`);
  line(`Veículo: ${order.plate} - ${order.model}`);
  line(`Responsável: ${order.responsibleName ?? '-'}`);
  if (order.executorName) line(`Executor: ${order.executorName}`);
  y += 2;

  line('Problema relatado', LEFT, 12);
  paragraph(order.problem);
  if (order.diagnosis) {
    line('Diagnóstico', LEFT, 12);
    paragraph(order.diagnosis);
  }
  y += 2;
  rule();

  // Items table
  line('Itens', LEFT, 12);
  row([
    ['Descrição', LEFT],
    ['Qtd', 120],
    ['Unitário', 140],
    ['Subtotal', 170]
  ]);
  if (!items.length) line('Nenhum item lançado.');
  for (const item of items) {
    row([
      [item.description.slice(0, 60), LEFT],
      [String(item.qty), 120],
      [formatMoney(item.unitPrice), 140],
      [formatMoney(item.subtotal), 170]
    ]);
  }
  y += 2;

  line('Pagamentos', LEFT, 12);
  if (!payments.length) line('Nenhum pagamento registrado.');
  for (const payment of payments) {
    line(`${brazilianDate(payment.paidOn)}  ${payment.method}  ${formatMoney(payment.amount)}`);
  }
  y += 2;
  rule();

  line(`Itens: ${formatMoney(order.totals.itemsTotal)}`);
  line(`Mão de obra: ${formatMoney(order.labor)}`);
  line(`Desconto: ${formatMoney(order.discount)}`);
  line(`Total: ${formatMoney(order.totals.total)}`, LEFT, 12);
  line(`Pago: ${formatMoney(order.totals.paidTotal)}`);
  line(`Saldo: ${formatMoney(order.totals.balance)}`, LEFT, 12);
  y += 4;
  line(`Gerado em ${dateTimeLabel(generatedAt)}`, LEFT, 8);

  return Buffer.from(doc.output('arraybuffer'));
}

export function orderPdf(
  db: Db,
  actor: TenantActor,
  id: number
): Result<{ filename: string; content: Buffer }> {
  const detail = getOrderDetail(db, actor, id);
  if (!detail.ok) return detail;
  return ok({
    filename: `os_${id}.pdf`,
    content: renderOrderPdf(actor.company, detail.data, new Date().toISOString())
  });
}
