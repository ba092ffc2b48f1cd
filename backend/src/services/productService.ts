import { Db } from '../db/database';
import { ProductData, ProductSchema } from '../models/schemas';
import { Page, Product, Result, TenantActor } from '../models/structures';
import { likePattern } from '../utils/text';
import { err, offsetOf, ok, PAGE_SIZE, pageNumber, toPage, validate } from './common';

export interface ProductRow {
  id: number;
  company_id: number;
  name: string;
  code: string;
  description: string;
  cost: number | null;
  price: number;
  stock: number | null;
  min_stock: number;
}

export const toProduct = (row: ProductRow): Product => ({
  id: row.id,
  companyId: row.company_id,
  name: row.name,
  code: row.code,
  description: row.description,
  cost: row.cost,
  price: row.price,
  stock: row.stock,
  minStock: row.min_stock
});

export interface ProductSaved {
  product: Product;
  warnings: string[];
}

const PRODUCT_NOT_FOUND = 'Produto não encontrado.';
const DUPLICATE_NAME = 'Já existe um produto com este nome.';

export function findProduct(db: Db, actor: TenantActor, id: number): Product | null {
  const row = db
    .prepare<unknown[], ProductRow>('SELECT * FROM products WHERE id = ? AND company_id = ?')
    .get(id, actor.company.id);
  return row ? toProduct(row) : null;
}

export function allProducts(db: Db, actor: TenantActor): Product[] {
  return db
    .prepare<unknown[], ProductRow>('SELECT * FROM products WHERE company_id = ? ORDER BY name')
    .all(actor.company.id)
    .map(toProduct);
}

function nameTaken(db: Db, actor: TenantActor, name: string, exceptId = 0): boolean {
  const row = db
    .prepare<unknown[], { id: number }>(
      'SELECT id FROM products WHERE company_id = ? AND name = ? AND id <> ?'
    )
    .get(actor.company.id, name, exceptId);
  return row !== undefined;
}

const priceWarnings = (data: Pick<ProductData, 'cost' | 'price'>): string[] =>
  data.cost !== null && data.cost > data.price ? ['Atenção: o custo está maior que o preço.'] : [];

export function insertProduct(db: Db, actor: TenantActor, data: ProductData): Product {
  const info = db
    .prepare(
      `INSERT INTO products (company_id, name, code, description, cost, price, stock, min_stock)
       VALUES (@companyId, @name, @code, @description, @cost, @price, @stock, @minStock)`
    )
    .run({ ...data, companyId: actor.company.id });
  const product = findProduct(db, actor, Number(info.lastInsertRowid));
  if (!product) throw new Error('product insert did not persist');
  return product;
}

export function writeProduct(db: Db, actor: TenantActor, id: number, data: ProductData): void {
  db.prepare(
    `UPDATE products SET name = @name, code = @code, description = @description, cost = @cost,
       price = @price, stock = @stock, min_stock = @minStock
     WHERE id = @id AND company_id = @companyId`
  ).run({ ...data, id, companyId: actor.company.id });
}

// LIST products (name or code search), newest first
export function listProducts(
  db: Db,
  actor: TenantActor,
  query: { q?: unknown; page?: unknown }
): Page<Product> {
  const page = pageNumber(query.page);
  const pattern = likePattern(query.q);
  const where = pattern
    ? `WHERE company_id = ? AND (name LIKE ? ESCAPE '\\' OR code LIKE ? ESCAPE '\\')`
    : 'WHERE company_id = ?';
  const params: unknown[] = pattern ? [actor.company.id, pattern, pattern] : [actor.company.id];

  const total = db
    .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM products ${where}`)
    .get(...params);
  const rows = db
    .prepare<unknown[], ProductRow>(
      `SELECT * FROM products ${where} ORDER BY id DESC LIMIT ${PAGE_SIZE} OFFSET ?`
    )
    .all(...params, offsetOf(page));
  return toPage(rows.map(toProduct), total?.n ?? 0, page);
}

export function getProduct(db: Db, actor: TenantActor, id: number): Result<Product> {
  const product = findProduct(db, actor, id);
  return product ? ok(product) : err('PRODUCT_NOT_FOUND', PRODUCT_NOT_FOUND);
}

// CREATE a product; a cost above the price is allowed but flagged
export function createProduct(db: Db, actor: TenantActor, input: unknown): Result<ProductSaved> {
  const parsed = validate(ProductSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  if (nameTaken(db, actor, data.name)) return err('DUPLICATE_PRODUCT_NAME', DUPLICATE_NAME);
  return ok({ product: insertProduct(db, actor, data), warnings: priceWarnings(data) });
}

export function updateProduct(
  db: Db,
  actor: TenantActor,
  id: number,
  input: unknown
): Result<ProductSaved> {
  if (!findProduct(db, actor, id)) return err('PRODUCT_NOT_FOUND', PRODUCT_NOT_FOUND);
  const parsed = validate(ProductSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  if (nameTaken(db, actor, data.name, id)) return err('DUPLICATE_PRODUCT_NAME', DUPLICATE_NAME);
  writeProduct(db, actor, id, data);
  const product = findProduct(db, actor, id);
  if (!product) return err('PRODUCT_NOT_FOUND', PRODUCT_NOT_FOUND);
  return ok({ product, warnings: priceWarnings(data) });
}

// DELETE a product; order items keep their description (product_id -> NULL)
export function deleteProduct(db: Db, actor: TenantActor, id: number): Result<{ deletedId: number }> {
  const info = db
    .prepare('DELETE FROM products WHERE id = ? AND company_id = ?')
    .run(id, actor.company.id);
  if (info.changes === 0) return err('PRODUCT_NOT_FOUND', PRODUCT_NOT_FOUND);
  return ok({ deletedId: id });
}

/** Products at or below their minimum stock, lowest stock first. */
export function criticalStock(db: Db, actor: TenantActor, limit?: number): { total: number; items: Product[] } {
  const where = 'WHERE company_id = ? AND stock IS NOT NULL AND stock <= min_stock';
  const total = db
    .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM products ${where}`)
    .get(actor.company.id);
  const sql = `SELECT * FROM products ${where} ORDER BY stock, name${limit ? ` LIMIT ${limit}` : ''}`;
  const items = db.prepare<unknown[], ProductRow>(sql).all(actor.company.id).map(toProduct);
  return { total: total?.n ?? 0, items };
}
