// ═══════════════════════════════════════════════════════
// Fleet servicing — Core Type Definitions
// Every data shape passed between the store, the services and the routes.
// ═══════════════════════════════════════════════════════

// ── Lookups ──

export interface Lookup {
  id: number;
  name: string;
}

export interface LookupSet {
  ships: Lookup[];
  ports: Lookup[];
  contractors: Lookup[];
  pollutants: Lookup[];
}

// ── Operations ──

export interface LineItem {
  pollutantId: number;
  name: string;
  volume: number;   // cubic meters
  cost: number;
}

/** Substance id → amounts, as read from a create/edit form. */
export type LineItemMap = Map<number, { volume: number; cost: number }>;

export interface OperationInput {
  shipId: number;
  portId: number;
  contractorId: number;
  date: string;            // YYYY-MM-DD
  hasDocuments: boolean;
}

export interface OperationView {
  id: number;
  ship: Lookup;
  port: Lookup;
  contractor: Lookup;
  date: string;
  hasDocuments: boolean;
  pollutants: LineItem[];
  totalCost: number;
}

/** GET /operation/:id payload */
export interface OperationDetailPayload {
  id: number;
  ship: string;
  port: string;
  contractor: string;
  date: string;
  has_documents: boolean;
  pollutants: { name: string; volume: number; cost: number }[];
  total_cost: number;
}

// ── Filters ──

export type SortOrder = 'asc' | 'desc';

export interface OperationFilters {
  shipIds?: number[];
  startDate?: string;
  endDate?: string;
  portId?: number;
  sortOrder: SortOrder;
}

/** A filter parameter that was present but ignored. */
export interface DroppedFilter {
  param: string;
  value: string;
  reason: string;
}

/** Applied filters echoed back to the list view. */
export interface FilterEcho {
  shipIds: number[];
  startDate: string | null;
  endDate: string | null;
  portId: number | null;
  sortOrder: SortOrder;
}

// ── Analytics ──

export interface FleetLineItem {
  pollutantId: number;
  volume: number;
  cost: number;
}

export interface FleetOperation {
  id: number;
  shipId: number;
  date: string;
  lineItems: FleetLineItem[];
}

export interface FleetSnapshot {
  ships: Lookup[];
  pollutants: Lookup[];
  operations: FleetOperation[];
}

export interface ShipSummary {
  shipId: number;
  shipName: string;
  operationCount: number;
  totalVolume: number;
  totalCost: number;
  substances: string[];
  firstDate: string | null;
  lastDate: string | null;
}

export interface BreakdownRow {
  shipId: number;
  shipName: string;
  pollutantId: number;
  substance: string;
  totalVolume: number;
  totalCost: number;
}

export interface FleetAggregate {
  cutoff: string;
  summary: ShipSummary[];
  breakdown: BreakdownRow[];
}

export interface FleetCharts {
  volumeByShip: Buffer;
  costByShip: Map<string, Buffer>;
}

export interface AnalyticsPayload extends FleetAggregate {
  charts: {
    volumeByShip: string;
    costByShip: Record<string, string>;
  };
}
