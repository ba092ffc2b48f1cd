import { BOM, exportProductsCsv, importProductsCsv, parseCsv } from '../services/productCsv';
import { allProducts, createProduct } from '../services/productService';
import { freshDb, seedTenant } from './__mocks__/fixtures';

describe('parseCsv', () => {
  test('quotes, doubled quotes, CRLF and blank lines', () => {
    expect(parseCsv('a,"b,c"\r\n"x""y",\n\nz')).toEqual([['a', 'b,c'], ['x"y', ''], [], ['z']]);
  });
});

describe('exportProductsCsv', () => {
  test('writes a BOM, the header and quoted cells', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    createProduct(db, actor, { name: 'Pastilha', description: 'Jogo "dianteiro"', price: 120 });
    createProduct(db, actor, { name: 'Filtro, especial', cost: 20, price: 35.5, stock: 4 });

    expect(exportProductsCsv(db, actor)).toBe(
      `${BOM}Nome,Descrição,Código,Custo,Preço,Estoque\r\n` +
        '"Filtro, especial",,,20,35.5,4\r\n' +
        'Pastilha,"Jogo ""dianteiro""",,,120,\r\n'
    );
  });
});

describe('importProductsCsv', () => {
  test('creates new names and updates existing ones case-insensitively', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    createProduct(db, actor, { name: 'Filtro de óleo', price: 35, stock: 5, minStock: 2 });

    const csv =
      `${BOM}Nome,Descrição,Código,Custo,Preço,Estoque\n` +
      'filtro de óleo,Novo,F1,"R$ 1.234,50",1500,10\n' +
      'Vela,,V1,,"12,90",\n';
    const result = importProductsCsv(db, actor, csv);
    expect(result).toEqual({
      ok: true,
      data: { created: 1, updated: 1, message: '1 produto(s) importado(s), 1 atualizado(s) com sucesso.' }
    });

    const products = allProducts(db, actor).map(({ name, code, cost, price, stock, minStock }) => ({
      name,
      code,
      cost,
      price,
      stock,
      minStock
    }));
    expect(products).toEqual([
      { name: 'Vela', code: 'V1', cost: null, price: 12.9, stock: null, minStock: 0 },
      { name: 'filtro de óleo', code: 'F1', cost: 1234.5, price: 1500, stock: 10, minStock: 2 }
    ]);
  });

  test('reads decimals written in scientific notation', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);

    const result = importProductsCsv(db, actor, 'Junta,,,"2,5e1",1e3,2E1\n');
    expect(result.ok).toBe(true);
    expect(allProducts(db, actor).map(({ name, cost, price, stock }) => ({ name, cost, price, stock }))).toEqual([
      { name: 'Junta', cost: 25, price: 1000, stock: 20 }
    ]);
  });

  test('reports every bad line and writes nothing', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    const csv = 'Pneu,,,,abc,1\n,,,,10,\nCorreia,,,,10,2.5\nSó,dois\n';

    const result = importProductsCsv(db, actor, csv);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('CSV_INVALID');
      expect(result.error.details).toEqual([
        "Linha 1: valor inválido em 'Preço'.",
        "Linha 2: campo 'Nome' é obrigatório.",
        "Linha 3: 'Estoque' deve ser inteiro.",
        'Linha 4: número de colunas inválido (esperado 6).'
      ]);
    }
    expect(allProducts(db, actor)).toEqual([]);
  });

  test('price is required and cannot be negative', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);

    const missing = importProductsCsv(db, actor, 'Pneu,,,,,1\n');
    expect(missing.ok).toBe(false);
    if (!missing.ok) expect(missing.error.message).toBe("Linha 1: campo 'Preço' é obrigatório.");

    const negative = importProductsCsv(db, actor, 'Pneu,,,,-5,1\n');
    expect(negative.ok).toBe(false);
    if (!negative.ok) expect(negative.error.message).toBe("Linha 1: 'Preço' não pode ser negativo.");
  });

  test('rejects empty files, wrong columns and header-only files', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    const messageOf = (csv: string) => {
      const result = importProductsCsv(db, actor, csv);
      return result.ok ? null : result.error.message;
    };

    expect(messageOf('')).toBe('Arquivo CSV vazio.');
    expect(messageOf('a,b\n')).toBe(
      'CSV com colunas inválidas. Use a ordem: Nome, Descrição, Código, Custo, Preço, Estoque.'
    );
    expect(messageOf('nome,descricao,codigo,custo,preco,estoque\n')).toBe(
      'Nenhum produto válido encontrado no CSV.'
    );
  });
});
