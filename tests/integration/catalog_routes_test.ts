/**
 * Catalog Routes Integration Tests
 *
 * Drives the whole application through `handle()` against an in-memory
 * database and the real views.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { fileURLToPath } from 'node:url';
import type { Application } from '../../framework/app.ts';
import { Config } from '../../framework/config/config.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';
import { createCatalogApp, openCatalogDatabase, type CatalogDatabase } from '../../src/mod.ts';

const VIEWS = fileURLToPath(new URL('../../views', import.meta.url));
const PUBLIC = fileURLToPath(new URL('../../public', import.meta.url));

interface Harness {
  app: Application;
  db: CatalogDatabase;
  entries: LogEntry[];
}

function setup(): Harness {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'info', output: (entry) => entries.push(entry) });
  const config = new Config({
    env: 'test',
    database: { path: ':memory:' },
    views: { path: VIEWS, cache: false },
    static: { path: PUBLIC, prefix: '/_static' },
  });
  const db = openCatalogDatabase(':memory:', logger);
  const app = createCatalogApp({ config, database: db, logger });
  return { app, db, entries };
}

function get(app: Application, path: string): Promise<Response> {
  return app.handle(new Request(`http://localhost${path}`));
}

function post(app: Application, path: string, fields: Record<string, string> = {}): Promise<Response> {
  return app.handle(
    new Request(`http://localhost${path}`, { method: 'POST', body: new URLSearchParams(fields) })
  );
}

async function seed(app: Application): Promise<void> {
  await post(app, '/add_author', { name: 'Ann Lee', birth_date: '1950-01-01', date_of_death: '' });
  await post(app, '/add_book', { isbn: '0441172717', title: 'Dune', year: '1965', author_id: '1' });
}

test('GET / redirects to the book list', async () => {
  const { app, db } = setup();
  try {
    const res = await get(app, '/');
    assert.equal(res.status, 302);
    assert.equal(res.headers.get('location'), '/home');
  } finally {
    db.close();
  }
});

test('GET /home - empty catalog invites adding a book', async () => {
  const { app, db } = setup();
  try {
    const res = await get(app, '/home');
    const body = await res.text();

    assert.equal(res.status, 200);
    assert.equal(res.headers.get('content-type'), 'text/html; charset=utf-8');
    assert.ok(body.includes('<title>Books | Library</title>'));
    assert.ok(body.includes('<link rel="stylesheet" href="/_static/style.css">'));
    assert.ok(body.includes('<li class="empty">No books yet.'));
  } finally {
    db.close();
  }
});

test('POST /add_author - adds the author and clears the form', async () => {
  const { app, db } = setup();
  try {
    const res = await post(app, '/add_author', { name: 'Ann Lee', birth_date: '1950-01-01' });
    const body = await res.text();

    assert.equal(res.status, 200);
    assert.ok(
      body.includes('<p class="flash flash-success" role="status">Author &#39;Ann Lee&#39; added successfully.</p>')
    );
    assert.ok(body.includes('<input type="text" name="name" value="" maxlength="200" required>'));
  } finally {
    db.close();
  }
});

test('POST /add_author - empty name answers 400 and keeps the input', async () => {
  const { app, db } = setup();
  try {
    const res = await post(app, '/add_author', { name: '', birth_date: '1950-01-01' });
    const body = await res.text();

    assert.equal(res.status, 400);
    assert.ok(body.includes('<p class="flash flash-error" role="status">Author name cannot be empty.</p>'));
    assert.ok(body.includes('<input type="date" name="birth_date" value="1950-01-01" required>'));
  } finally {
    db.close();
  }
});

test('POST /add_author - without a body re-renders the form with 400', async () => {
  const { app, db } = setup();
  try {
    const res = await app.handle(new Request('http://localhost/add_author', { method: 'POST' }));
    const body = await res.text();

    assert.equal(res.status, 400);
    assert.ok(
      body.includes(
        '<p class="flash flash-error" role="status">Author name cannot be empty. Birth date is required.</p>'
      )
    );
  } finally {
    db.close();
  }
});

test('POST /add_book - a JSON body is treated as an empty form', async () => {
  const { app, db } = setup();
  try {
    const res = await app.handle(
      new Request('http://localhost/add_book', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ isbn: '0441172717' }),
      })
    );
    const body = await res.text();

    assert.equal(res.status, 400);
    assert.ok(
      body.includes(
        '<p class="flash flash-error" role="status">ISBN is required. Title is required. Year is required. Please choose an author.</p>'
      )
    );
  } finally {
    db.close();
  }
});

test('POST /add_author - duplicate answers 409', async () => {
  const { app, db } = setup();
  try {
    await post(app, '/add_author', { name: 'Ann Lee', birth_date: '1950-01-01' });
    const res = await post(app, '/add_author', { name: 'Ann Lee', birth_date: '1950-01-01' });

    assert.equal(res.status, 409);
    assert.ok((await res.text()).includes('Author &#39;Ann Lee&#39; already exists.'));
  } finally {
    db.close();
  }
});

test('GET /add_book - hints when there are no authors', async () => {
  const { app, db } = setup();
  try {
    const body = await (await get(app, '/add_book')).text();
    assert.ok(body.includes('<p class="hint">There are no authors yet.'));
  } finally {
    db.close();
  }
});

test('POST /add_book - invalid input keeps the chosen author selected', async () => {
  const { app, db } = setup();
  try {
    await post(app, '/add_author', { name: 'Ann Lee', birth_date: '1950-01-01' });
    const res = await post(app, '/add_book', { isbn: '12', title: 'Dune', year: '1965', author_id: '1' });
    const body = await res.text();

    assert.equal(res.status, 400);
    assert.ok(
      body.includes(
        '<p class="flash flash-error" role="status">ISBN must have 10 characters (the last may be X) or 13 digits.</p>'
      )
    );
    assert.ok(body.includes('<option value="1" selected>Ann Lee</option>'));
  } finally {
    db.close();
  }
});

test('POST /add_book - book shows up on the home page', async () => {
  const { app, db } = setup();
  try {
    await post(app, '/add_author', { name: 'Ann Lee', birth_date: '1950-01-01' });
    const added = await post(app, '/add_book', { isbn: '0441172717', title: 'Dune', year: '1965', author_id: '1' });
    assert.equal(added.status, 200);
    assert.ok((await added.text()).includes('Book &#39;Dune&#39; added successfully.'));

    const body = await (await get(app, '/home')).text();
    assert.ok(body.includes('<h2 class="book-title">Dune</h2>'));
    assert.ok(body.includes('<p class="book-author">Ann Lee</p>'));
    assert.ok(body.includes('<img src="https://covers.openlibrary.org/b/isbn/0441172717-M.jpg"'));
    assert.ok(body.includes('<a class="button danger" href="/book/1/delete">Delete</a>'));
    assert.equal(body.includes('No books yet.'), false);
  } finally {
    db.close();
  }
});

test('POST /add_book - duplicate ISBN answers 409', async () => {
  const { app, db } = setup();
  try {
    await seed(app);
    const res = await post(app, '/add_book', { isbn: '0441172717', title: 'Again', year: '1966', author_id: '1' });

    assert.equal(res.status, 409);
    assert.ok((await res.text()).includes('Book with ISBN &#39;0441172717&#39;, &#39;Dune&#39;, already exists.'));
  } finally {
    db.close();
  }
});

test('GET /home - search with no match shows a message', async () => {
  const { app, db } = setup();
  try {
    await seed(app);
    const body = await (await get(app, '/home?search=zzz&sort=year&order=desc')).text();

    assert.ok(body.includes('<p class="flash flash-error" role="status">Search term &#39;zzz&#39; not found.</p>'));
    assert.ok(body.includes('<option value="year" selected>Year</option>'));
    assert.ok(body.includes('<option value="desc" selected>Descending</option>'));
    assert.ok(body.includes('<a class="button" href="/home">Clear</a>'));
    assert.equal(body.includes('No books yet.'), false);
  } finally {
    db.close();
  }
});

test('GET /book/:id/delete - asks for confirmation', async () => {
  const { app, db } = setup();
  try {
    await seed(app);
    const res = await get(app, '/book/1/delete');
    const body = await res.text();

    assert.equal(res.status, 200);
    assert.ok(body.includes('<p>Delete <strong>Dune</strong> by Ann Lee? This cannot be undone.</p>'));
    assert.ok(body.includes('<form class="inline" method="post" action="/book/1/delete">'));
  } finally {
    db.close();
  }
});

test('GET /book/:id/delete - missing book answers 404', async () => {
  const { app, db } = setup();
  try {
    const res = await get(app, '/book/7/delete');
    const body = await res.text();

    assert.equal(res.status, 404);
    assert.ok(body.includes('<h1>Error!</h1>'));
    assert.ok(body.includes('<p>Book not found.</p>'));
  } finally {
    db.close();
  }
});

test('POST /book/:id/delete - deletes the book and its last author', async () => {
  const { app, db } = setup();
  try {
    await seed(app);
    const res = await post(app, '/book/1/delete');
    const body = await res.text();

    assert.equal(res.status, 200);
    assert.ok(body.includes('<meta http-equiv="refresh" content="3;url=/home">'));
    assert.ok(body.includes('<title>Success! | Library</title>'));
    assert.ok(body.includes('<p>Book &#39;Dune&#39; deleted successfully.</p>'));

    const form = await (await get(app, '/add_book')).text();
    assert.ok(form.includes('<p class="hint">There are no authors yet.'));
  } finally {
    db.close();
  }
});

test('POST /book/:id/delete - missing book answers 404', async () => {
  const { app, db } = setup();
  try {
    const res = await post(app, '/book/999/delete');

    assert.equal(res.status, 404);
    assert.ok((await res.text()).includes('<title>Error! | Library</title>'));
  } finally {
    db.close();
  }
});

test('Non-numeric book ids fall through to the 404 page', async () => {
  const { app, db } = setup();
  try {
    const res = await get(app, '/book/abc/delete');
    const body = await res.text();

    assert.equal(res.status, 404);
    assert.ok(body.includes('<p>Nothing lives at <code>/book/abc/delete</code>.</p>'));
  } finally {
    db.close();
  }
});

test('Unsupported methods answer 405 with Allow', async () => {
  const { app, db } = setup();
  try {
    const res = await app.handle(new Request('http://localhost/home', { method: 'PUT' }));

    assert.equal(res.status, 405);
    assert.equal(res.headers.get('allow'), 'GET');
  } finally {
    db.close();
  }
});

test('Static files are served from the public directory', async () => {
  const { app, db } = setup();
  try {
    const res = await get(app, '/_static/style.css');
    assert.equal(res.status, 200);
    assert.equal(res.headers.get('content-type'), 'text/css; charset=utf-8');

    assert.equal((await get(app, '/_static/.hidden')).status, 404);
    assert.equal((await get(app, '/_static/missing.css')).status, 404);
  } finally {
    db.close();
  }
});

test('Requests are logged with their status', async () => {
  const { app, db, entries } = setup();
  try {
    await get(app, '/home');
    await get(app, '/nowhere');

    const lines = entries.filter((entry) => entry.context?.path !== undefined).map((entry) => entry.message);
    assert.deepEqual(lines, ['GET /home 200', 'GET /nowhere 404']);
  } finally {
    db.close();
  }
});
