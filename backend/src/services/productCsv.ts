import { Db } from '../db/database';
import { ProductData } from '../models/schemas';
import { Product, Result, TenantActor } from '../models/structures';
import logger from '../modules/logger';
import { stripAccents } from '../utils/text';
import { allProducts, insertProduct, writeProduct } from './productService';
import { err, ok } from './common';

export const BOM = '\uFEFF';
const HEADER = ['Nome', 'Descrição', 'Código', 'Custo', 'Preço', 'Estoque'];
const EXPECTED_HEADER = ['nome', 'descricao', 'codigo', 'custo', 'preco', 'estoque'];
const MAX_REPORTED_ERRORS = 8;

/**
 * Splits CSV text into rows of cells. Handles quoted cells, doubled quotes
 * and CRLF; an empty line yields an empty row.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;
  let touched = false;

  const endRow = () => {
    rows.push(touched ? [...row, cell] : []);
    row = [];
    cell = '';
    touched = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cell += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
      touched = true;
    } else if (ch === ',') {
      row.push(cell);
      cell = '';
      touched = true;
    } else if (ch === '\r' && text[i + 1] === '\n') {
      continue;
    } else if (ch === '\n' || ch === '\r') {
      endRow();
    } else {
      cell += ch;
      touched = true;
    }
  }
  if (touched) endRow();
  return rows;
}

const quoteCell = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

const numberCell = (value: number | null): string => (value === null ? '' : String(value));

// EXPORT products as CSV, UTF-8 with BOM
export function exportProductsCsv(db: Db, actor: TenantActor): string {
  const lines = [HEADER.map(quoteCell).join(',')];
  for (const product of allProducts(db, actor)) {
    lines.push(
      [
        product.name,
        product.description,
        product.code,
        numberCell(product.cost),
        numberCell(product.price),
        numberCell(product.stock)
      ]
        .map(quoteCell)
        .join(',')
    );
  }
  return `${BOM}${lines.join('\r\n')}\r\n`;
}

class RowError extends Error {}

const normalizeHeader = (cell: string) => stripAccents(cell).toLowerCase().trim();

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// "R$ 1.234,50" -> 1234.5
function parseDecimal(raw: string, label: string, line: number, required: boolean): number | null {
  let text = raw.trim();
  if (!text) {
    if (required) throw new RowError(`Linha ${line}: campo '${label}' é obrigatório.`);
    return null;
  }
  text = text.replace(/R\$/g, '').replace(/ /g, '');
  if (text.includes(',') && text.includes('.')) {
    text = text.replace(/\./g, '').replace(/,/g, '.');
  } else if (text.includes(',')) {
    text = text.replace(/,/g, '.');
  }
  if (!DECIMAL.test(text)) throw new RowError(`Linha ${line}: valor inválido em '${label}'.`);
  const value = Number(text);
  if (value < 0) throw new RowError(`Linha ${line}: '${label}' não pode ser negativo.`);
  return value;
}

function parseWhole(raw: string, label: string, line: number): number | null {
  const value = parseDecimal(raw, label, line, false);
  if (value === null) return null;
  if (!Number.isInteger(value)) throw new RowError(`Linha ${line}: '${label}' deve ser inteiro.`);
  return value;
}

export interface ImportSummary {
  created: number;
  updated: number;
  message: string;
}

// IMPORT products from CSV: all rows are applied, or none
export function importProductsCsv(db: Db, actor: TenantActor, content: string): Result<ImportSummary> {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;
  const rows = parseCsv(text);
  if (!rows.length) return err('CSV_INVALID', 'Arquivo CSV vazio.');

  const first = rows[0];
  let start = 0;
  if (first.map(normalizeHeader).join(',') === EXPECTED_HEADER.join(',')) {
    start = 1;
  } else if (first.length !== EXPECTED_HEADER.length) {
    return err(
      'CSV_INVALID',
      'CSV com colunas inválidas. Use a ordem: Nome, Descrição, Código, Custo, Preço, Estoque.'
    );
  }

  const existing = new Map<string, Product>();
  for (const product of allProducts(db, actor)) existing.set(product.name.trim().toLowerCase(), product);

  const toCreate = new Map<string, ProductData>();
  const toUpdate = new Map<number, ProductData>();
  const errors: string[] = [];

  rows.slice(start).forEach((row, index) => {
    const line = start + index + 1;
    if (row.every((cell) => !cell.trim())) return;
    if (row.length !== EXPECTED_HEADER.length) {
      errors.push(`Linha ${line}: número de colunas inválido (esperado ${EXPECTED_HEADER.length}).`);
      return;
    }
    const [rawName, description, code, cost, price, stock] = row;
    const name = rawName.trim();
    if (!name) {
      errors.push(`Linha ${line}: campo 'Nome' é obrigatório.`);
      return;
    }

    let data: ProductData;
    try {
      data = {
        name,
        description: description.trim(),
        code: code.trim(),
        cost: parseDecimal(cost, 'Custo', line, false),
        price: parseDecimal(price, 'Preço', line, true) ?? 0,
        stock: parseWhole(stock, 'Estoque', line),
        minStock: 0
      };
    } catch (e) {
      if (!(e instanceof RowError)) throw e;
      errors.push(e.message);
      return;
    }

    const key = name.toLowerCase();
    const match = existing.get(key);
    if (match) {
      toUpdate.set(match.id, { ...data, minStock: match.minStock });
    } else {
      toCreate.set(key, data);
    }
  });

  if (errors.length) {
    const details = errors.slice(0, MAX_REPORTED_ERRORS);
    if (errors.length > MAX_REPORTED_ERRORS) {
      details.push(`E mais ${errors.length - MAX_REPORTED_ERRORS} erro(s).`);
    }
    return err('CSV_INVALID', details[0], details);
  }
  if (!toCreate.size && !toUpdate.size) {
    return err('CSV_INVALID', 'Nenhum produto válido encontrado no CSV.');
  }

  db.transaction(() => {
    for (const data of toCreate.values()) insertProduct(db, actor, data);
    for (const [id, data] of toUpdate) writeProduct(db, actor, id, data);
  })();

  const created = toCreate.size;
  const updated = toUpdate.size;
  logger.info('products imported', { companyId: actor.company.id, created, updated });
  return ok({
    created,
    updated,
    message: `${created} produto(s) importado(s), ${updated} atualizado(s) com sucesso.`
  });
}
