/**
 * In-memory SpreadsheetClient for offline connection tests
 *
 * Holds spreadsheets as plain grids and counts remote-looking calls, so
 * tests can assert caching and mode behavior without a network.
 *
 * Usage:
 *   const backend = createInMemorySheets("crud");
 *   backend.addSpreadsheet("KEY...", "Budget", [{ title: "Sheet1", grid: [["a"], ["1"]] }]);
 *   const conn = new GSheetsConnection(config, { createClient: backend.createClient });
 */

import type {
  ConnectionMode,
  Credential,
  RawGrid,
  SheetCellInput,
  SpreadsheetClient,
  SpreadsheetHandle,
  SpreadsheetReference,
  WorksheetHandle,
  WorksheetProperties,
  WorksheetReference,
} from "@/types";
import { ConfigError, ModeError, NotFoundError } from "@/errors";

type StoredWorksheet = {
  properties: WorksheetProperties;
  grid: RawGrid;
};

type StoredSpreadsheet = {
  id: string;
  title: string;
  worksheets: StoredWorksheet[];
};

export type InMemoryCalls = {
  createClient: number;
  verify: number;
  openSpreadsheet: number;
  getAllValues: number;
  update: number;
  appendRows: number;
  clear: number;
  addWorksheet: number;
  createSpreadsheet: number;
};

export interface InMemorySheets {
  createClient: (credential: Credential) => SpreadsheetClient;
  addSpreadsheet(
    id: string,
    title: string,
    worksheets: { title: string; grid: RawGrid; gid?: number }[],
  ): void;
  /** Spreadsheet id by title, if one exists */
  idOf(title: string): string | undefined;
  /** Current grid of a worksheet, by title */
  gridOf(spreadsheetId: string, title: string): RawGrid;
  /** Replace a worksheet grid behind the connection's back */
  setGrid(spreadsheetId: string, title: string, grid: RawGrid): void;
  /** Ranges passed to update(), in call order */
  updatedRanges: string[];
  calls: InMemoryCalls;
  /** Resolves before each getAllValues(); lets tests hold fetches open */
  readGate?: () => Promise<void>;
  /** Thrown by verify() when set */
  verifyError?: Error;
}

function emptyCalls(): InMemoryCalls {
  return {
    createClient: 0,
    verify: 0,
    openSpreadsheet: 0,
    getAllValues: 0,
    update: 0,
    appendRows: 0,
    clear: 0,
    addWorksheet: 0,
    createSpreadsheet: 0,
  };
}

function lastNonEmptyRow(grid: RawGrid): number {
  for (let i = grid.length - 1; i >= 0; i--) {
    if (grid[i].some((cell) => cell !== "" && cell !== null && cell !== undefined)) {
      return i;
    }
  }
  return -1;
}

export function createInMemorySheets(mode: ConnectionMode): InMemorySheets {
  const spreadsheets = new Map<string, StoredSpreadsheet>();
  let nextGid = 1000;

  const state: InMemorySheets = {
    createClient: () => {
      state.calls.createClient++;
      return client;
    },
    addSpreadsheet(id, title, worksheets) {
      spreadsheets.set(id, {
        id,
        title,
        worksheets: worksheets.map((ws, index) => ({
          properties: { title: ws.title, gid: ws.gid ?? index, index },
          grid: ws.grid.map((row) => [...row]),
        })),
      });
    },
    idOf(title) {
      return [...spreadsheets.values()].find((s) => s.title === title)?.id;
    },
    gridOf(spreadsheetId, title) {
      return findByTitle(spreadsheetId, title).grid;
    },
    setGrid(spreadsheetId, title, grid) {
      findByTitle(spreadsheetId, title).grid = grid.map((row) => [...row]);
    },
    updatedRanges: [],
    calls: emptyCalls(),
  };

  function getSpreadsheet(id: string): StoredSpreadsheet {
    const stored = spreadsheets.get(id);
    if (!stored) {
      throw new NotFoundError(`Spreadsheet ${id} not found`, { spreadsheet: id });
    }
    return stored;
  }

  function findByTitle(spreadsheetId: string, title: string): StoredWorksheet {
    const ws = getSpreadsheet(spreadsheetId).worksheets.find(
      (w) => w.properties.title === title,
    );
    if (!ws) {
      throw new NotFoundError(`Worksheet ${title} not found`, { worksheet: title });
    }
    return ws;
  }

  function worksheetHandle(stored: StoredWorksheet): WorksheetHandle {
    const writable = (): void => {
      if (mode !== "crud") {
        throw new ModeError("update");
      }
    };
    return {
      key: `gid:${stored.properties.gid}`,
      title: stored.properties.title,
      async getAllValues() {
        state.calls.getAllValues++;
        if (state.readGate) {
          await state.readGate();
        }
        return stored.grid.map((row) => [...row]);
      },
      async update(range: string, values: SheetCellInput[][]) {
        writable();
        state.calls.update++;
        state.updatedRanges.push(range);
        values.forEach((row, r) => {
          const target = stored.grid[r] ?? [];
          row.forEach((cell, c) => {
            target[c] = cell;
          });
          stored.grid[r] = target;
        });
      },
      async appendRows(values: SheetCellInput[][]) {
        writable();
        state.calls.appendRows++;
        const start = lastNonEmptyRow(stored.grid) + 1;
        stored.grid.splice(start, stored.grid.length - start, ...values.map((row) => [...row]));
      },
      async clear() {
        writable();
        state.calls.clear++;
        stored.grid = [];
      },
    };
  }

  function spreadsheetHandle(stored: StoredSpreadsheet): SpreadsheetHandle {
    return {
      id: stored.id,
      title: stored.title,
      async worksheet(ref: WorksheetReference) {
        const ordered = [...stored.worksheets].sort(
          (a, b) => a.properties.index - b.properties.index,
        );
        let found: StoredWorksheet | undefined;
        switch (ref.kind) {
          case "title":
            found = ordered.find((ws) => ws.properties.title === ref.title);
            break;
          case "gid":
            found = ordered.find((ws) => ws.properties.gid === ref.gid);
            break;
          case "index":
            found = ordered[ref.index];
            break;
          case "default":
            found = ordered[0];
            break;
        }
        if (!found) {
          throw new NotFoundError(`Worksheet not found in ${stored.id}`, {
            spreadsheet: stored.id,
          });
        }
        return worksheetHandle(found);
      },
      async listWorksheets() {
        return stored.worksheets.map((ws) => ({ ...ws.properties }));
      },
      async addWorksheet(title: string, rows: number, cols: number) {
        if (mode !== "crud") {
          throw new ModeError("create");
        }
        state.calls.addWorksheet++;
        const properties: WorksheetProperties = {
          title,
          gid: nextGid++,
          index: stored.worksheets.length,
          rowCount: rows,
          columnCount: cols,
        };
        stored.worksheets.push({ properties, grid: [] });
        return { ...properties };
      },
    };
  }

  const client: SpreadsheetClient = {
    mode,
    async verify() {
      state.calls.verify++;
      if (state.verifyError) {
        throw state.verifyError;
      }
    },
    async openSpreadsheet(ref: SpreadsheetReference) {
      state.calls.openSpreadsheet++;
      if (ref.kind === "name") {
        if (mode !== "crud") {
          throw new ConfigError("title lookup needs a service account");
        }
        const match = [...spreadsheets.values()].find((s) => s.title === ref.name);
        if (!match) {
          throw new NotFoundError(`Spreadsheet "${ref.name}" not found`);
        }
        return spreadsheetHandle(match);
      }
      const stored = spreadsheets.get(ref.key);
      if (stored) {
        return spreadsheetHandle(stored);
      }
      // Service accounts retry a bare id as a title
      const byTitle =
        mode === "crud" && ref.kind === "id"
          ? [...spreadsheets.values()].find((s) => s.title === ref.key)
          : undefined;
      return spreadsheetHandle(byTitle ?? getSpreadsheet(ref.key));
    },
    async createSpreadsheet(title: string) {
      if (mode !== "crud") {
        throw new ModeError("create");
      }
      state.calls.createSpreadsheet++;
      const stored: StoredSpreadsheet = {
        id: `created-${nextGid++}`,
        title,
        worksheets: [
          { properties: { title: "Sheet1", gid: 0, index: 0 }, grid: [] },
        ],
      };
      spreadsheets.set(stored.id, stored);
      return spreadsheetHandle(stored);
    },
  };

  return state;
}
