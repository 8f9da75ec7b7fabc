/**
 * Catalog Schema
 *
 * drizzle-orm table definitions for authors and books, plus the DDL that
 * creates them on first open.
 *
 * @module
 */

import { relations } from 'drizzle-orm';
import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const authors = sqliteTable('authors', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  birthDate: text('birth_date').notNull(),
  dateOfDeath: text('date_of_death'),
});

export const books = sqliteTable('books', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  isbn: text('isbn').notNull().unique(),
  title: text('title').notNull(),
  year: integer('year').notNull(),
  cover: text('cover').notNull(),
  authorId: integer('author_id')
    .notNull()
    .references(() => authors.id),
});

export const authorsRelations = relations(authors, ({ many }) => ({
  books: many(books),
}));

export const booksRelations = relations(books, ({ one }) => ({
  author: one(authors, {
    fields: [books.authorId],
    references: [authors.id],
  }),
}));

export type AuthorRow = typeof authors.$inferSelect;
export type BookRow = typeof books.$inferSelect;
export type NewBookRow = typeof books.$inferInsert;

export const catalogSchema = { authors, books, authorsRelations, booksRelations };
export type CatalogSchema = typeof catalogSchema;

export const CATALOG_MIGRATIONS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS authors (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    birth_date TEXT NOT NULL,
    date_of_death TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS books (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    isbn TEXT NOT NULL UNIQUE,
    title TEXT NOT NULL,
    year INTEGER NOT NULL,
    cover TEXT NOT NULL,
    author_id INTEGER NOT NULL REFERENCES authors(id)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_books_author_id ON books(author_id)`,
];
