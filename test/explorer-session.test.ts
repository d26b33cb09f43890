import assert from 'node:assert/strict';
import test from 'node:test';

import createExplorerSession from '../src/index.js';
import { ExecutionError, ExplorerError, InvalidFilterError } from '../src/lib/errors.js';
import { resolveExplorerConfig } from '../src/lib/explorer-config.js';
import type { ExplorerConfigInput } from '../src/lib/explorer-config.js';
import { ExplorerSession } from '../src/lib/explorer-session.js';
import type { ResultRecord } from '../src/lib/result-projector.js';
import { odooTables, productTables, rawTable, serveCatalog } from './helpers/catalog-fixtures.js';
import { FakeTransport } from './helpers/fake-transport.js';

const COMPANY_ROWS = /^SELECT t0\."id" AS "__id", t0\."id" AS "c0", t0\."name" AS "c1" FROM "public"\."res_company"/;
const COUNT = /^SELECT COUNT\(\*\)/;
const SCHEMA = 'SELECT n.oid, pg_catalog.has_schema_privilege';

const createSession = (config: ExplorerConfigInput = {}) => {
  const transport = serveCatalog(new FakeTransport(), odooTables())
    .on(COUNT, [{ total: 1 }])
    .on(COMPANY_ROWS, [{ __id: 1, c0: 1, c1: 'YourCompany' }]);
  const session = new ExplorerSession(transport, resolveExplorerConfig(config));
  return { transport, session };
};

const partnerRecord = (values: ResultRecord['values'] = {}): ResultRecord => ({
  model: 'res.partner',
  id: 7,
  values,
});

test('ExplorerSession needs a schema refresh before serving models', () => {
  const { session } = createSession();

  assert.throws(
    () => session.listModels(),
    (error: unknown) => error instanceof ExplorerError && error.code === 'SCHEMA_NOT_LOADED'
  );
});

test('ExplorerSession lists and describes inferred models', async () => {
  const { session } = createSession();
  await session.refreshSchema();

  const models = session.listModels();
  assert.deepEqual(
    models.map(summary => summary.name),
    ['res.company', 'res.partner', 'res.partner.category', 'res.users']
  );
  assert.deepEqual(models[1], {
    name: 'res.partner',
    table: 'public.res_partner',
    fieldCount: 8,
    traits: ['multi-company', 'archivable'],
    inherits: [],
    readable: true,
    comment: null,
  });
  assert.deepEqual(models[3]?.inherits, ['res.partner']);

  assert.equal(session.describeModel('public.res_users').name, 'res.users');
  assert.throws(
    () => session.describeModel('sale.order'),
    (error: unknown) => error instanceof InvalidFilterError && error.message === "Unknown model 'sale.order'"
  );
});

test('concurrent refreshes share one catalog read', async () => {
  const { session, transport } = createSession();

  const first = session.refreshSchema();
  const second = session.refreshSchema();
  assert.equal(first, second);

  const graph = await first;
  assert.equal(graph.size, 4);
  assert.equal(transport.statements(SCHEMA).length, 1);
  assert.equal(session.generation, 1);

  await session.refreshSchema();
  assert.equal(session.generation, 2);
  assert.equal(transport.statements(SCHEMA).length, 2);
});

test('a refresh for other schemas runs after the one in flight instead of joining it', async () => {
  const transport = serveCatalog(new FakeTransport(), [
    ...odooTables(),
    rawTable('ledger', { schema: 'accounting', columns: [['id', 'integer']], primaryKey: ['id'] }),
  ]);
  const session = new ExplorerSession(transport, resolveExplorerConfig());

  const first = session.refreshSchema();
  const second = session.refreshSchema({ schemas: ['accounting'] });
  assert.notEqual(first, second);

  const [publicGraph, accountingGraph] = await Promise.all([first, second]);
  assert.equal(publicGraph.has('res.partner'), true);
  assert.equal(publicGraph.has('accounting:ledger'), false);
  assert.deepEqual(
    accountingGraph.list().map(model => model.name),
    ['accounting:ledger']
  );
  assert.deepEqual(
    transport.statements(SCHEMA).map(query => query.params),
    [['public'], ['accounting']]
  );
  assert.equal(session.generation, 2);
});

const isCancelled = (error: unknown) => error instanceof ExecutionError && error.reason === 'cancelled';

test('one caller abandoning a shared refresh does not cancel it for the others', async () => {
  const { session } = createSession();
  const controller = new AbortController();

  const abandoned = session.refreshSchema({ signal: controller.signal });
  const kept = session.refreshSchema();
  controller.abort();

  await assert.rejects(abandoned, isCancelled);
  const graph = await kept;
  assert.equal(graph.size, 4);
  assert.equal(session.generation, 1);
});

test('a refresh abandoned by its only caller stops reading the catalog', async () => {
  const { session } = createSession();
  const controller = new AbortController();

  const refresh = session.refreshSchema({ signal: controller.signal });
  controller.abort();

  await assert.rejects(refresh, isCancelled);
  assert.equal(session.generation, 0);

  await session.refreshSchema();
  assert.equal(session.generation, 1);
});

test('schemas the role cannot use are reported after a refresh', async () => {
  const transport = serveCatalog(
    new FakeTransport(),
    [...odooTables(), rawTable('ledger', { schema: 'secret', columns: [['id', 'integer']], primaryKey: ['id'] })],
    ['secret']
  );
  const session = new ExplorerSession(transport, resolveExplorerConfig({ schemas: ['public', 'secret'] }));

  await session.refreshSchema();

  assert.deepEqual(
    session.skippedSchemas.map(error => error.context.schema),
    ['secret']
  );
  assert.equal(session.describeModel('res.partner').name, 'res.partner');
});

test('query validates requests and returns a projected page', async () => {
  const { session, transport } = createSession();
  await session.refreshSchema();

  const result = await session.query({ model: 'res.company' });

  assert.equal(result.total, 1);
  assert.deepEqual(result.records[0]?.values.name, 'YourCompany');
  assert.deepEqual(transport.statements(COMPANY_ROWS)[0]?.params, [100, 0]);

  await assert.rejects(
    session.query({ model: 'res.company', page: { offset: -5 } }),
    (error: unknown) => error instanceof InvalidFilterError && error.message.startsWith('Invalid query request: page.offset')
  );
  await assert.rejects(
    session.query({ model: 'res.company', locale: 'French' }),
    (error: unknown) => error instanceof InvalidFilterError
  );
});

test('repeated queries are served from the session cache until refreshed', async () => {
  const { session, transport } = createSession();
  await session.refreshSchema();

  const first = await session.query({ model: 'res.company' });
  const second = await session.query({ model: 'res.company' });
  assert.equal(second, first);
  assert.equal(transport.statements(COMPANY_ROWS).length, 1);

  await session.query({ model: 'res.company', fresh: true });
  assert.equal(transport.statements(COMPANY_ROWS).length, 2);

  await session.refreshSchema();
  await session.query({ model: 'res.company' });
  assert.equal(transport.statements(COMPANY_ROWS).length, 3);
});

const SALE_LINE_ROWS = /^SELECT t0\."id" AS "__id", t0\."id" AS "c0", t0\."product_tmpl_id" AS "c1" FROM "public"\."sale_line"/;

test('cached pages are kept apart per locale', async () => {
  const saleLine = rawTable('sale_line', {
    columns: [
      ['id', 'integer'],
      ['product_tmpl_id', 'integer'],
    ],
    primaryKey: ['id'],
    foreignKeys: [{ columns: ['product_tmpl_id'], table: 'product_template' }],
  });
  const transport = serveCatalog(new FakeTransport(), [...productTables(), saleLine])
    .on(COUNT, [{ total: 1 }])
    .on(SALE_LINE_ROWS, [{ __id: 1, c0: 1, c1: 4 }])
    .on(/FROM "public"\."product_template" AS l0/, params => [
      { key: 4, label: params[1] === 'fr_FR' ? 'Chaise' : 'Stuhl' },
    ]);
  const session = new ExplorerSession(transport, resolveExplorerConfig());
  await session.refreshSchema();

  const french = await session.query({ model: 'sale.line', locale: 'fr_FR' });
  const german = await session.query({ model: 'sale.line', locale: 'de_DE' });

  const product = (label: string) => ({ kind: 'relation', model: 'product.template', id: 4, label, resolved: true });
  assert.deepEqual(french.records[0]?.values.product_tmpl_id, product('Chaise'));
  assert.deepEqual(german.records[0]?.values.product_tmpl_id, product('Stuhl'));
  assert.equal(german.locale, 'de_DE');
  assert.notEqual(german, french);
  assert.equal(transport.statements(SALE_LINE_ROWS).length, 2);

  assert.equal(await session.query({ model: 'sale.line', locale: 'fr_FR' }), french);
  assert.equal(transport.statements(SALE_LINE_ROWS).length, 2);
});

test('distinctValues validates the request and lists the values of one field', async () => {
  const { session, transport } = createSession();
  transport.on(/^SELECT DISTINCT/, [{ value: 'YourCompany' }]);
  await session.refreshSchema();

  const result = await session.distinctValues({ model: 'res.company', path: 'name', limit: 10 });

  assert.deepEqual(result.values, ['YourCompany']);
  assert.equal(result.distinctCount, null);
  assert.equal(result.limit, 10);
  assert.deepEqual(
    transport.statements(/^SELECT DISTINCT/).map(query => [query.sql, query.params]),
    [['SELECT DISTINCT t0."name" AS "value" FROM "public"."res_company" AS t0 ORDER BY "value" ASC LIMIT $1', [10]]]
  );

  await assert.rejects(
    session.distinctValues({ model: 'res.company' }),
    (error: unknown) =>
      error instanceof InvalidFilterError && error.message === 'Invalid distinct-values request: path: Required'
  );
});

test('fetchRelated follows a many2one to its target record', async () => {
  const { session, transport } = createSession();
  await session.refreshSchema();

  const related = await session.fetchRelated(
    partnerRecord({
      company_id: { kind: 'relation', model: 'res.company', id: 1, label: 'YourCompany', resolved: true },
    }),
    'company_id'
  );

  assert.equal(related.model, 'res.company');
  const [query] = transport.statements(COMPANY_ROWS);
  assert.equal(
    query?.sql,
    'SELECT t0."id" AS "__id", t0."id" AS "c0", t0."name" AS "c1" FROM "public"."res_company" AS t0 ' +
      'WHERE t0."id" = $1 ORDER BY t0."id" ASC LIMIT $2 OFFSET $3'
  );
  assert.deepEqual(query?.params, [1, 100, 0]);
});

test('fetchRelated on an empty many2one matches nothing', async () => {
  const { session, transport } = createSession();
  await session.refreshSchema();

  await session.fetchRelated(partnerRecord({ company_id: null }), 'company_id');

  assert.deepEqual(transport.statements(COMPANY_ROWS)[0]?.params, [[], 100, 0]);
});

test('fetchRelated follows one2many fields through their inverse column', async () => {
  const { session, transport } = createSession();
  transport.on(/^SELECT t0\."id" AS "__id".* FROM "public"\."res_partner" AS t0 WHERE/, []);
  await session.refreshSchema();

  const related = await session.fetchRelated(partnerRecord(), 'res_partner_parent_ids', { page: { offset: 0, limit: 5 } });

  assert.equal(related.model, 'res.partner');
  const [query] = transport.statements(/^SELECT t0\."id" AS "__id".* FROM "public"\."res_partner" AS t0 WHERE/);
  assert.equal(query?.sql.endsWith('WHERE t0."parent_id" = $1 ORDER BY t0."id" ASC LIMIT $2 OFFSET $3'), true);
  assert.deepEqual(query?.params, [7, 5, 0]);
});

test('fetchRelated follows many2many fields through the junction table', async () => {
  const { session, transport } = createSession();
  transport.on(/^SELECT t0\."id" AS "__id".* FROM "public"\."res_partner_category" AS t0/, []);
  await session.refreshSchema();

  await session.fetchRelated(partnerRecord(), 'category_ids');

  const [query] = transport.statements(/^SELECT t0\."id" AS "__id".* FROM "public"\."res_partner_category" AS t0/);
  assert.equal(
    query?.sql,
    'SELECT t0."id" AS "__id", t0."id" AS "c0", t0."name" AS "c1" FROM "public"."res_partner_category" AS t0 ' +
      'WHERE EXISTS (SELECT 1 FROM "public"."res_partner_res_partner_category_rel" AS j1 ' +
      'WHERE j1."category_id" = t0."id" AND j1."partner_id" = ANY($1)) ORDER BY t0."id" ASC LIMIT $2 OFFSET $3'
  );
  assert.deepEqual(query?.params, [[7], 100, 0]);
});

test('fetchRelated rejects fields that are not relations', async () => {
  const { session } = createSession();
  await session.refreshSchema();

  await assert.rejects(session.fetchRelated(partnerRecord(), 'name'), InvalidFilterError);
});

test('close releases the transport and drops cached state', async () => {
  const { session, transport } = createSession();
  await session.refreshSchema();

  await session.close();

  assert.equal(transport.closed, true);
  assert.throws(() => session.listModels(), ExplorerError);
});

test('createExplorerSession wraps a caller-supplied transport', async () => {
  const transport = serveCatalog(new FakeTransport(), odooTables());
  const session = await createExplorerSession({ transport, config: { rowCeiling: 10 } });

  assert.equal(session.transport, transport);
  assert.equal(session.config.rowCeiling, 10);
  assert.deepEqual(await session.listSchemas(), ['public']);
});
