import type { IpoEntry, RawIpoRecord } from "../types.js";

export function rawRecord(overrides: RawIpoRecord = {}): RawIpoRecord {
  return {
    id: 101,
    symbol: "<span>ABC</span>",
    company_name: "Alpha Co",
    opening_date: "<span>2024-01-01</span>",
    closing_date: "<span>2024-01-05</span>",
    status: "<span>Open</span>",
    view: "<a href='https://x/101'>view</a>",
    units: "1000",
    issue_manager: "Mgr",
    price: 100,
    ...overrides,
  };
}

export function entry(id: number, overrides: Partial<IpoEntry> = {}): IpoEntry {
  return {
    id,
    symbol: `<span>S${id}</span>`,
    symbolClean: `S${id}`,
    companyName: `Company ${id}`,
    units: "1000",
    openingDate: "2024-01-01",
    closingDate: "2024-01-05",
    issueManager: "Mgr",
    price: "100",
    status: "Open",
    url: `https://x/${id}`,
    ...overrides,
  };
}
