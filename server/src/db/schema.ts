/** SQL schema for the catalog database. */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS items (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  title         TEXT NOT NULL CHECK(length(trim(title)) > 0),
  year          INTEGER CHECK(year IS NULL OR year > 0),
  plot          TEXT,
  poster_url    TEXT,
  poster_path   TEXT,
  format        TEXT NOT NULL DEFAULT 'Blu-ray'
                CHECK(format IN ('DVD','Blu-ray','4K')),
  watched       INTEGER NOT NULL DEFAULT 0,
  location      TEXT,
  notes         TEXT,
  created_at    TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at    TEXT NOT NULL DEFAULT (datetime('now')),
  -- Provenance
  source        TEXT,
  source_id     TEXT
);

CREATE TABLE IF NOT EXISTS lists (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  name          TEXT NOT NULL UNIQUE COLLATE NOCASE,
  created_at    TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS list_items (
  list_id       INTEGER NOT NULL REFERENCES lists(id) ON DELETE CASCADE,
  item_id       INTEGER NOT NULL REFERENCES items(id) ON DELETE CASCADE,
  position      INTEGER NOT NULL,
  PRIMARY KEY (list_id, item_id)
);

CREATE INDEX IF NOT EXISTS idx_items_title     ON items(title COLLATE NOCASE);
CREATE INDEX IF NOT EXISTS idx_list_items_pos  ON list_items(list_id, position);
`;
