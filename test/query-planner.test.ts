import assert from 'node:assert/strict';
import test from 'node:test';

import { InvalidFilterError, UnsupportedTraversalError } from '../src/lib/errors.js';
import { asc, desc, ops, page } from '../src/lib/filter-spec.js';
import type { PlannerSettings } from '../src/lib/query-planner.js';
import { labelLookupStatement, QueryPlanner } from '../src/lib/query-planner.js';
import type { SchemaGraph } from '../src/lib/schema-graph.js';
import type { InferenceOptions } from '../src/lib/schema-inferencer.js';
import { inferSchema } from '../src/lib/schema-inferencer.js';
import type { LogicalModel } from '../src/lib/schema-types.js';
import { odooTables, productTables, rawTable } from './helpers/catalog-fixtures.js';

const settings: PlannerSettings = {
  defaultLocale: 'en_US',
  rowCeiling: 1000,
  defaultPageSize: 100,
  countMode: 'exact',
};

const setup = (options: InferenceOptions = {}, overrides: Partial<PlannerSettings> = {}) => {
  const graph = inferSchema([...odooTables(), ...productTables()], options);
  const planner = new QueryPlanner(graph, { ...settings, ...overrides });
  return { graph, planner };
};

const model = (graph: SchemaGraph, name: string): LogicalModel => {
  const found = graph.get(name);
  if (!found) {
    assert.fail(`Missing model ${name}`);
  }
  return found;
};

const PARTNER_SELECT =
  'SELECT t0."id" AS "__id", t0."id" AS "c0", t0."name" AS "c1", t0."company_id" AS "c2", ' +
  't0."parent_id" AS "c3", t0."active" AS "c4" FROM "public"."res_partner" AS t0';

test('plans a plain page with a stable key ordering', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.partner'), [], [], page(0, 10));

  assert.equal(plan.rows.sql, `${PARTNER_SELECT} ORDER BY t0."id" ASC LIMIT $1 OFFSET $2`);
  assert.deepEqual(plan.rows.params, [10, 0]);
  assert.equal(plan.count.sql, 'SELECT COUNT(*) AS "total" FROM "public"."res_partner" AS t0');
  assert.deepEqual(plan.count.params, []);
  assert.equal(plan.countIsEstimate, false);
  assert.equal(plan.keyAlias, '__id');
  assert.deepEqual(
    plan.columns.map(column => `${column.alias}=${column.field.name}`),
    ['c0=id', 'c1=name', 'c2=company_id', 'c3=parent_id', 'c4=active']
  );
  assert.deepEqual(
    plan.lazyFields.map(field => field.name),
    ['category_ids', 'res_partner_parent_ids', 'res_users_id_ids']
  );
  assert.deepEqual(plan.page, { offset: 0, limit: 10, requestedLimit: 10 });
  assert.equal(plan.truncated, false);
  assert.equal(plan.locale, 'en_US');
});

test('filter values are bound as parameters, never inlined', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.partner'), [ops.ilike('name', "acme'; DROP TABLE x")], [], page(0, 10));

  assert.equal(
    plan.rows.sql,
    `${PARTNER_SELECT} WHERE t0."name" ILIKE $1 ORDER BY t0."id" ASC LIMIT $2 OFFSET $3`
  );
  assert.deepEqual(plan.rows.params, ["%acme'; DROP TABLE x%", 10, 0]);
  assert.equal(plan.count.sql, 'SELECT COUNT(*) AS "total" FROM "public"."res_partner" AS t0 WHERE t0."name" ILIKE $1');
  assert.deepEqual(plan.count.params, ["%acme'; DROP TABLE x%"]);
});

test('many2one equality compares the foreign key column', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.partner'), [ops.eq('company_id', 1)], [], page(0, 10));

  assert.equal(
    plan.rows.sql,
    `${PARTNER_SELECT} WHERE t0."company_id" = $1 ORDER BY t0."id" ASC LIMIT $2 OFFSET $3`
  );
  assert.deepEqual(plan.rows.params, [1, 10, 0]);
});

test('text search on a many2one matches the target record name through one join', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.partner'), [ops.ilike('company_id', 'main')], [], page(0, 10));

  assert.equal(
    plan.rows.sql,
    `${PARTNER_SELECT} LEFT JOIN "public"."res_company" AS h1 ON h1."id" = t0."company_id" ` +
      'WHERE h1."name" ILIKE $1 ORDER BY t0."id" ASC LIMIT $2 OFFSET $3'
  );
  assert.deepEqual(plan.rows.params, ['%main%', 10, 0]);
});

test('scalar operators render their SQL forms', () => {
  const { graph, planner } = setup();
  const partner = model(graph, 'res.partner');
  const where = (filter: Parameters<QueryPlanner['plan']>[1]) =>
    planner.plan(partner, filter).count;

  assert.deepEqual(where([ops.neq('name', 'x')]).sql.split(' WHERE ')[1], 't0."name" IS DISTINCT FROM $1');
  assert.deepEqual(where([ops.eq('parent_id', null)]).sql.split(' WHERE ')[1], 't0."parent_id" IS NULL');
  assert.deepEqual(where([ops.in('id', [1, 2])]).sql.split(' WHERE ')[1], 't0."id" = ANY($1)');
  assert.deepEqual(
    where([ops.notIn('id', [1, 2])]).sql.split(' WHERE ')[1],
    '(t0."id" IS NULL OR t0."id" <> ALL($1))'
  );
  assert.deepEqual(where([ops.between('id', 1, 5)]).sql.split(' WHERE ')[1], 't0."id" BETWEEN $1 AND $2');
  assert.deepEqual(where([ops.between('id', 1, 5)]).params, [1, 5]);
  assert.deepEqual(where([ops.like('id', '7')]).sql.split(' WHERE ')[1], 't0."id"::text LIKE $1');
  assert.deepEqual(
    where([ops.isNotNull('name'), ops.gte('id', 3)]).sql.split(' WHERE ')[1],
    't0."name" IS NOT NULL AND t0."id" >= $1'
  );
});

test('many2many id filters read the junction table only', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.partner'), [ops.in('category_ids', [3, 4])], [], page(0, 10));

  assert.equal(
    plan.rows.sql,
    `${PARTNER_SELECT} WHERE EXISTS (SELECT 1 FROM "public"."res_partner_res_partner_category_rel" AS j1 ` +
      'WHERE j1."partner_id" = t0."id" AND j1."category_id" = ANY($1)) ORDER BY t0."id" ASC LIMIT $2 OFFSET $3'
  );
  assert.deepEqual(plan.rows.params, [[3, 4], 10, 0]);
});

test('one2many paths filter through a correlated subquery', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.partner'), [ops.eq('res_partner_parent_ids.name', 'Child')]);

  assert.equal(
    plan.count.sql,
    'SELECT COUNT(*) AS "total" FROM "public"."res_partner" AS t0 WHERE EXISTS ' +
      '(SELECT 1 FROM "public"."res_partner" AS s1 WHERE s1."parent_id" = t0."id" AND s1."name" = $1)'
  );
  assert.deepEqual(plan.count.params, ['Child']);
});

test('negated many2many filters use NOT EXISTS', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.partner'), [ops.notIn('category_ids', [3])]);

  assert.equal(
    plan.count.sql,
    'SELECT COUNT(*) AS "total" FROM "public"."res_partner" AS t0 WHERE NOT EXISTS ' +
      '(SELECT 1 FROM "public"."res_partner_res_partner_category_rel" AS j1 ' +
      'WHERE j1."partner_id" = t0."id" AND j1."category_id" = ANY($1))'
  );
});

test('page limits above the row ceiling are clamped and reported', () => {
  const { graph, planner } = setup({}, { rowCeiling: 50 });
  const plan = planner.plan(model(graph, 'res.company'), [], [], page(20, 80));

  assert.deepEqual(plan.page, { offset: 20, limit: 50, requestedLimit: 80 });
  assert.equal(plan.truncated, true);
  assert.deepEqual(plan.rows.params, [50, 20]);
});

test('the default page size applies when no limit is given', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.company'));

  assert.deepEqual(plan.page, { offset: 0, limit: 100, requestedLimit: 100 });
  assert.equal(plan.truncated, false);
});

test('jsonb translations read the requested locale first', () => {
  const { graph, planner } = setup({ translatedFields: { 'res.partner.category': ['name'] } });
  const plan = planner.plan(model(graph, 'res.partner.category'), [], [], page(), { locale: 'fr_FR' });

  assert.equal(
    plan.rows.sql,
    'SELECT t0."id" AS "__id", t0."id" AS "c0", COALESCE(t0."name" ->> $1, t0."name" ->> $2) AS "c1" ' +
      'FROM "public"."res_partner_category" AS t0 ORDER BY t0."id" ASC LIMIT $3 OFFSET $4'
  );
  assert.deepEqual(plan.rows.params, ['fr_FR', 'en_US', 100, 0]);
  assert.equal(plan.locale, 'fr_FR');
});

test('side-table translations join one row per locale and fall back to the base column', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'product.template'), [], [], page(), { locale: 'fr_FR' });

  const lateral = (alias: string, placeholder: string) =>
    `LEFT JOIN LATERAL (SELECT x.* FROM "public"."product_template_translation" AS x ` +
    `WHERE x."res_id" = t0."id" AND x."lang" = ${placeholder} LIMIT 1) AS ${alias} ON TRUE`;

  assert.equal(
    plan.rows.sql,
    'SELECT t0."id" AS "__id", t0."id" AS "c0", ' +
      `COALESCE(NULLIF(tr1."name", ''), NULLIF(tr2."name", ''), t0."name") AS "c1" ` +
      `FROM "public"."product_template" AS t0 ${lateral('tr1', '$1')} ${lateral('tr2', '$2')} ` +
      'ORDER BY t0."id" ASC LIMIT $3 OFFSET $4'
  );
  assert.deepEqual(plan.rows.params, ['fr_FR', 'en_US', 100, 0]);
});

test('a missing translation falls back to the base column value', () => {
  const translations = rawTable('ir_translation', {
    columns: [
      ['id', 'integer'],
      ['res_id', 'integer'],
      ['lang', 'character varying'],
      ['value', 'text'],
    ],
    primaryKey: ['id'],
    foreignKeys: [{ columns: ['res_id'], table: 'res_partner' }],
  });
  const graph = inferSchema([...odooTables(), translations], { translatedFields: { 'res.partner': ['name'] } });
  const planner = new QueryPlanner(graph, settings);

  const plan = planner.plan(model(graph, 'res.partner'), [], [], page(), { locale: 'fr_FR' });

  const lateral = (alias: string, placeholder: string) =>
    `LEFT JOIN LATERAL (SELECT x.* FROM "public"."ir_translation" AS x ` +
    `WHERE x."res_id" = t0."id" AND x."lang" = ${placeholder} LIMIT 1) AS ${alias} ON TRUE`;
  assert.equal(
    plan.rows.sql,
    'SELECT t0."id" AS "__id", t0."id" AS "c0", ' +
      `COALESCE(NULLIF(tr1."value", ''), NULLIF(tr2."value", ''), t0."name") AS "c1", ` +
      't0."company_id" AS "c2", t0."parent_id" AS "c3", t0."active" AS "c4" FROM "public"."res_partner" AS t0 ' +
      `${lateral('tr1', '$1')} ${lateral('tr2', '$2')} ORDER BY t0."id" ASC LIMIT $3 OFFSET $4`
  );
  assert.deepEqual(plan.rows.params, ['fr_FR', 'en_US', 100, 0]);
});

test('delegated fields are read through a join on the parent table', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.users'), [], [], page(0, 5));

  assert.equal(
    plan.rows.sql,
    'SELECT t0."id" AS "__id", t0."id" AS "c0", t0."login" AS "c1", t0."company_id" AS "c2", ' +
      'd1."name" AS "c3", d1."parent_id" AS "c4", d1."active" AS "c5" FROM "public"."res_users" AS t0 ' +
      'JOIN "public"."res_partner" AS d1 ON d1."id" = t0."id" ORDER BY t0."id" ASC LIMIT $1 OFFSET $2'
  );
  assert.equal(plan.count.sql, 'SELECT COUNT(*) AS "total" FROM "public"."res_users" AS t0');
  assert.deepEqual(
    plan.rows.tables.map(table => table.name),
    ['res_users', 'res_partner']
  );
});

test('label lookups are grouped per target model', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.users'));

  assert.deepEqual(
    plan.labelLookups.map(lookup => [lookup.model, lookup.fields]),
    [
      ['res.company', ['company_id']],
      ['res.partner', ['id', 'parent_id']],
    ]
  );

  const [company] = plan.labelLookups;
  if (!company) {
    assert.fail('Expected a res.company lookup');
  }
  const statement = labelLookupStatement(company, [1, 2]);
  assert.equal(
    statement.sql,
    'SELECT l0."id" AS "key", l0."name" AS "label" FROM "public"."res_company" AS l0 WHERE l0."id" = ANY($1)'
  );
  assert.deepEqual(statement.params, [[1, 2]]);
});

test('sorting adds the key as a tie breaker', () => {
  const { graph, planner } = setup();
  const plan = planner.plan(model(graph, 'res.partner'), [], [desc('name'), asc('company_id.name')], page(0, 10));

  assert.equal(
    plan.rows.sql,
    `${PARTNER_SELECT} LEFT JOIN "public"."res_company" AS h1 ON h1."id" = t0."company_id" ` +
      'ORDER BY t0."name" DESC, h1."name" ASC, t0."id" ASC LIMIT $1 OFFSET $2'
  );
});

test('estimated counts read planner statistics when nothing is filtered', () => {
  const { graph, planner } = setup({}, { countMode: 'estimate' });
  const partner = model(graph, 'res.partner');

  const plain = planner.plan(partner);
  assert.equal(
    plain.count.sql,
    'SELECT c.reltuples::bigint AS "total" FROM pg_catalog.pg_class c WHERE c.oid = to_regclass($1)'
  );
  assert.deepEqual(plain.count.params, ['"public"."res_partner"']);
  assert.equal(plain.countIsEstimate, true);

  const filtered = planner.plan(partner, [ops.eq('active', true)]);
  assert.equal(filtered.countIsEstimate, false);
});

test('paths crossing two relations are rejected', () => {
  const { graph, planner } = setup();
  const partner = model(graph, 'res.partner');

  assert.throws(
    () => planner.plan(partner, [ops.eq('parent_id.company_id.name', 'x')]),
    (error: unknown) => error instanceof UnsupportedTraversalError && error.context.path === 'parent_id.company_id.name'
  );
  assert.throws(
    () => planner.plan(partner, [ops.eq('parent_id.category_ids', 1)]),
    (error: unknown) => error instanceof UnsupportedTraversalError
  );
});

test('unknown fields and bad operands are invalid filters', () => {
  const { graph, planner } = setup();
  const partner = model(graph, 'res.partner');

  assert.throws(
    () => planner.plan(partner, [ops.eq('nickname', 'x')]),
    (error: unknown) =>
      error instanceof InvalidFilterError && error.message === "Field 'nickname' does not exist on model res.partner"
  );
  assert.throws(
    () => planner.plan(partner, [ops.eq('company_id.missing', 'x')]),
    (error: unknown) => error instanceof InvalidFilterError
  );
  assert.throws(
    () => planner.plan(partner, [ops.eq('name.length', 3)]),
    (error: unknown) => error instanceof InvalidFilterError && /is not a relation/.test(error.message)
  );
  assert.throws(
    () => planner.plan(partner, [ops.eq('name', [1, 2])]),
    (error: unknown) =>
      error instanceof InvalidFilterError &&
      error.message === "Operator '=' on 'name' expects a value, got [1,2]"
  );
  assert.throws(
    () => planner.plan(partner, [ops.gt('category_ids', 1)]),
    (error: unknown) => error instanceof InvalidFilterError
  );
  assert.throws(
    () => planner.plan(partner, [], [asc('category_ids.name')]),
    (error: unknown) => error instanceof InvalidFilterError
  );
  assert.throws(
    () => planner.plan(partner, [], [], { offset: -1 }),
    (error: unknown) => error instanceof InvalidFilterError
  );
});

test('identical requests share a fingerprint; different filters do not', () => {
  const { graph, planner } = setup();
  const partner = model(graph, 'res.partner');

  const first = planner.plan(partner, [ops.eq('name', 'a')]);
  const second = planner.plan(partner, [ops.eq('name', 'a')]);
  const third = planner.plan(partner, [ops.eq('name', 'b')]);

  assert.equal(first.fingerprint, second.fingerprint);
  assert.notEqual(first.fingerprint, third.fingerprint);
});

test('fingerprints differ per locale even when the row statement does not', () => {
  const { graph, planner } = setup();
  const company = model(graph, 'res.company');

  const french = planner.plan(company, [], [], page(), { locale: 'fr_FR' });
  const german = planner.plan(company, [], [], page(), { locale: 'de_DE' });

  assert.equal(french.rows.sql, german.rows.sql);
  assert.deepEqual(french.rows.params, german.rows.params);
  assert.notEqual(french.fingerprint, german.fingerprint);
});

const currencyTables = () => [
  rawTable('res_currency', {
    columns: [
      ['id', 'integer'],
      ['code', 'character varying', false],
      ['name', 'character varying'],
    ],
    primaryKey: ['id'],
    unique: [['code']],
  }),
  rawTable('rate_line', {
    columns: [
      ['id', 'integer'],
      ['currency_id', 'integer'],
      ['currency_code', 'character varying'],
      ['rate', 'numeric'],
    ],
    primaryKey: ['id'],
    foreignKeys: [
      { columns: ['currency_id'], table: 'res_currency' },
      { columns: ['currency_code'], table: 'res_currency', referencedColumns: ['code'] },
    ],
  }),
];

test('label lookups match ids on the column the foreign key references', () => {
  const graph = inferSchema(currencyTables());
  const planner = new QueryPlanner(graph, settings);
  const plan = planner.plan(model(graph, 'rate.line'));

  assert.deepEqual(
    plan.labelLookups.map(lookup => [lookup.model, lookup.key, lookup.fields]),
    [
      ['res.currency', 'code', ['currency_code']],
      ['res.currency', 'id', ['currency_id']],
    ]
  );

  const [byCode] = plan.labelLookups;
  if (!byCode) {
    assert.fail('Expected a lookup by currency code');
  }
  const statement = labelLookupStatement(byCode, ['EUR', 'USD']);
  assert.equal(
    statement.sql,
    'SELECT l0."code" AS "key", l0."name" AS "label" FROM "public"."res_currency" AS l0 WHERE l0."code" = ANY($1)'
  );
  assert.deepEqual(statement.params, [['EUR', 'USD']]);
});

test('distinct values are planned over the filtered rows with a bound limit', () => {
  const { graph, planner } = setup();
  const plan = planner.planDistinct(model(graph, 'res.partner'), 'company_id', [ops.eq('parent_id', 3)], {
    count: true,
  });

  assert.equal(
    plan.values.sql,
    'SELECT DISTINCT t0."company_id" AS "value" FROM "public"."res_partner" AS t0 ' +
      'WHERE t0."parent_id" = $1 ORDER BY "value" ASC LIMIT $2'
  );
  assert.deepEqual(plan.values.params, [3, 100]);
  assert.equal(
    plan.count?.sql,
    'SELECT COUNT(DISTINCT t0."company_id") AS "total" FROM "public"."res_partner" AS t0 WHERE t0."parent_id" = $1'
  );
  assert.deepEqual(plan.count?.params, [3]);
  assert.deepEqual(
    [plan.labelLookup?.model, plan.labelLookup?.key, plan.labelLookup?.fields],
    ['res.company', 'id', ['company_id']]
  );
  assert.equal(plan.limit, 100);
  assert.equal(plan.truncated, false);
});

test('distinct values through a many2one hop join the target once', () => {
  const { graph, planner } = setup();
  const plan = planner.planDistinct(model(graph, 'res.partner'), 'company_id.name');

  assert.equal(
    plan.values.sql,
    'SELECT DISTINCT h1."name" AS "value" FROM "public"."res_partner" AS t0 ' +
      'LEFT JOIN "public"."res_company" AS h1 ON h1."id" = t0."company_id" ORDER BY "value" ASC LIMIT $1'
  );
  assert.deepEqual(plan.values.params, [100]);
  assert.equal(plan.count, null);
  assert.equal(plan.labelLookup, null);
});

test('distinct limits are clamped to the row ceiling; to-many paths are rejected', () => {
  const { graph, planner } = setup();
  const partner = model(graph, 'res.partner');

  const clamped = planner.planDistinct(partner, 'name', [], { limit: 5000 });
  assert.equal(clamped.limit, 1000);
  assert.equal(clamped.requestedLimit, 5000);
  assert.equal(clamped.truncated, true);
  assert.deepEqual(clamped.values.params, [1000]);

  assert.throws(
    () => planner.planDistinct(partner, 'category_ids'),
    (error: unknown) =>
      error instanceof InvalidFilterError &&
      error.message === "Cannot list distinct values of to-many path 'category_ids'"
  );
  assert.throws(
    () => planner.planDistinct(partner, 'name', [], { limit: 0 }),
    (error: unknown) =>
      error instanceof InvalidFilterError && error.message === 'Distinct limit must be a positive integer, got 0'
  );
});
