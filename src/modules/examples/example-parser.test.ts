import test from 'node:test';
import assert from 'node:assert/strict';
import { embeddingText, parseExampleFile, titleFromFilename } from './example-parser.js';

test('title and description tags are read from leading comments', () => {
  const content = '-- Title: Active users\n-- Description: Users currently active\nSELECT * FROM users WHERE active = true;';
  assert.deepEqual(parseExampleFile('active_users.sql', content), {
    filename: 'active_users.sql',
    title: 'Active users',
    description: 'Users currently active',
    sql: content
  });
});

test('a prose first line is the title and a fenced block is the SQL', () => {
  const content = 'Current drivers status\n\n```sql\nSELECT d.id FROM asset_driver d\n```\n';
  assert.deepEqual(parseExampleFile('current_drivers_status.sql', content), {
    filename: 'current_drivers_status.sql',
    title: 'Current drivers status',
    description: undefined,
    sql: 'SELECT d.id FROM asset_driver d;'
  });
});

test('a block description falls back to the filename for the title', () => {
  const content = '/* Description: Products below reorder level */\nSELECT name FROM products WHERE stock < 10';
  const parsed = parseExampleFile('low_stock_products.sql', content);
  assert.equal(parsed?.title, 'Low Stock Products');
  assert.equal(parsed?.description, 'Products below reorder level');
  assert.equal(parsed?.sql, `${content};`);
});

test('a Question tag is used as the description', () => {
  const parsed = parseExampleFile(
    'drivers_with_expired_certificates.sql',
    '-- Question: Which drivers have expired certificates?\nSELECT 1;'
  );
  assert.equal(parsed?.title, 'Drivers With Expired Certificates');
  assert.equal(parsed?.description, 'Which drivers have expired certificates?');
});

test('an untagged first comment is not a title', () => {
  assert.equal(parseExampleFile('recent_orders.sql', '-- just a note about joins\nSELECT 1;')?.title, 'Recent Orders');
});

test('a file without SQL is skipped', () => {
  assert.equal(parseExampleFile('blank.sql', '  \n\n'), null);
});

test('titleFromFilename title-cases the stem', () => {
  assert.equal(titleFromFilename('recent_orders-last 30_days.sql'), 'Recent Orders Last 30 Days');
});

test('embeddingText joins title, description and SQL', () => {
  assert.equal(embeddingText({ title: 'T', sql: 'SELECT 1;' }), 'T\n\nSELECT 1;');
  assert.equal(embeddingText({ title: 'T', description: 'D', sql: 'SELECT 1;' }), 'T\nD\nSELECT 1;');
});
