import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { StoreError } from "../errors.js";
import type { IpoEntry, StoredIpoEntry } from "../types.js";

type IpoRow = {
  id: number;
  symbol_clean: string;
  company_name: string;
  units: string;
  opening_date: string;
  closing_date: string;
  issue_manager: string;
  price: string;
  status: string;
  url: string | null;
  first_seen: string;
};

type InsertRow = Omit<IpoRow, "first_seen">;

/** SQLite persistence of every IPO id ever seen; insert-once, never updated. */
export class IpoDB {
  private db: Database.Database;
  private qIds: Database.Statement<[], { id: number }>;
  private qGet: Database.Statement<[number], IpoRow>;
  private qCount: Database.Statement<[], { n: number }>;
  private qInsert: Database.Statement<[InsertRow]>;
  private insertMany: (entries: readonly IpoEntry[]) => number;

  constructor(path: string) {
    try {
      if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
      this.db = new Database(path);
      this.db.pragma("journal_mode = WAL");
      this.db.exec(`CREATE TABLE IF NOT EXISTS ipo_entries (
        id INTEGER PRIMARY KEY,
        symbol_clean TEXT,
        company_name TEXT,
        units TEXT,
        opening_date TEXT,
        closing_date TEXT,
        issue_manager TEXT,
        price TEXT,
        status TEXT,
        url TEXT,
        first_seen TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );`);
      this.qIds = this.db.prepare<[], { id: number }>(
        "SELECT id FROM ipo_entries"
      );
      this.qGet = this.db.prepare<[number], IpoRow>(
        "SELECT * FROM ipo_entries WHERE id=?"
      );
      this.qCount = this.db.prepare<[], { n: number }>(
        "SELECT COUNT(*) AS n FROM ipo_entries"
      );
      this.qInsert = this.db.prepare<InsertRow>(`INSERT OR IGNORE INTO ipo_entries
        (id, symbol_clean, company_name, units, opening_date, closing_date,
         issue_manager, price, status, url)
        VALUES (@id, @symbol_clean, @company_name, @units, @opening_date,
         @closing_date, @issue_manager, @price, @status, @url)`);
    } catch (err) {
      throw new StoreError(`cannot open IPO store at ${path}`, { cause: err });
    }

    this.insertMany = this.db.transaction((entries: readonly IpoEntry[]) => {
      let inserted = 0;
      for (const e of entries) {
        inserted += this.qInsert.run({
          id: e.id,
          symbol_clean: e.symbolClean,
          company_name: e.companyName,
          units: e.units,
          opening_date: e.openingDate,
          closing_date: e.closingDate,
          issue_manager: e.issueManager,
          price: e.price,
          status: e.status,
          url: e.url ?? null,
        }).changes;
      }
      return inserted;
    });
  }

  loadKnownIds(): Set<number> {
    try {
      return new Set(this.qIds.all().map((r) => r.id));
    } catch (err) {
      throw new StoreError("cannot read known IPO ids", { cause: err });
    }
  }

  /** Rows whose id already exists are ignored. Returns rows actually added. */
  insertIfAbsent(entries: readonly IpoEntry[]): number {
    if (!entries.length) return 0;
    try {
      return this.insertMany(entries);
    } catch (err) {
      throw new StoreError("cannot write IPO entries", { cause: err });
    }
  }

  get(id: number): StoredIpoEntry | undefined {
    const row = this.qGet.get(id);
    if (!row) return undefined;
    const entry: StoredIpoEntry = {
      id: row.id,
      symbolClean: row.symbol_clean,
      companyName: row.company_name,
      units: row.units,
      openingDate: row.opening_date,
      closingDate: row.closing_date,
      issueManager: row.issue_manager,
      price: row.price,
      status: row.status,
      firstSeen: row.first_seen,
    };
    if (row.url) entry.url = row.url;
    return entry;
  }

  count(): number {
    return this.qCount.get()?.n ?? 0;
  }

  close() {
    this.db.close();
  }
}
