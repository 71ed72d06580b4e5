import type { CellValue, MonthKey } from '../../lib/dates';

export type LocationClass = 'warehouse' | 'site';

export type StorageType = 'indoor' | 'outdoor' | 'other';

export type CaseRow = Record<string, CellValue>;

export type LocationColumn = {
  name: string;
  column: string;
  locationClass: LocationClass;
  /** Position in the catalog's declaration order; breaks same-timestamp ties. */
  rank: number;
  storageType: StorageType | null;
};

export type CaseSchema = {
  caseIdColumn: string;
  quantityColumn: string | null;
  categoryColumn: string | null;
  warehouses: LocationColumn[];
  sites: LocationColumn[];
};

export type LocationEvent = {
  at: Date;
  location: string;
  locationClass: LocationClass;
  rank: number;
};

export type CaseRecord = {
  caseId: string;
  rowNumber: number;
  quantity: number;
  category: string | null;
  events: LocationEvent[];
};

export type DeltaDirection = 'inbound' | 'outbound';

export type TransitionDelta = {
  location: string;
  locationClass: LocationClass;
  direction: DeltaDirection;
  month: MonthKey;
  caseId: string;
  quantity: number;
};

export type TimelineState =
  | { kind: 'no_location' }
  | { kind: 'at_warehouse'; warehouse: string; since: Date }
  | { kind: 'delivered'; site: string; at: Date };

export type DuplicateArrivalPolicy = 'ignore' | 'reenter';
export type PostDeliveryPolicy = 'ignore' | 'reopen';

export type TransitionPolicies = {
  duplicateArrival: DuplicateArrivalPolicy;
  postDelivery: PostDeliveryPolicy;
};

export type TimelineAnomalyReason = 'SAME_TIMESTAMP' | 'DUPLICATE_ARRIVAL' | 'POST_DELIVERY_EVENT';

export type WarehouseLeg = {
  warehouse: string;
  arrivedAt: Date;
  leftAt: Date | null;
  dwellDays: number | null;
};

export type IgnoredEvent = {
  event: LocationEvent;
  reason: Exclude<TimelineAnomalyReason, 'SAME_TIMESTAMP'>;
};

export type CaseTimeline = {
  caseId: string;
  quantity: number;
  events: LocationEvent[];
  applied: LocationEvent[];
  ignored: IgnoredEvent[];
  deltas: TransitionDelta[];
  legs: WarehouseLeg[];
  finalState: TimelineState;
  anomalies: AnomalousTimelineWarning[];
};

export type CaseStatus = 'not_received' | 'pending' | 'completed';

export type CaseOutcome = {
  caseId: string;
  status: CaseStatus;
  quantity: number;
  category: string | null;
  elapsedDays: number | null;
  leadTimeDays: number | null;
  lastKnownLocation: string | null;
  lastKnownLocationClass: LocationClass | null;
  lastWarehouse: string | null;
  lastWarehouseAt: Date | null;
  initialWarehouse: string | null;
  deliveredAt: Date | null;
  legs: WarehouseLeg[];
};

export type WarehouseLedgerMonth = {
  month: MonthKey;
  inbound: number;
  outbound: number;
  stock: number;
};

export type WarehouseLedger = {
  warehouse: string;
  openingStock: number;
  deltasAfterRange: number;
  months: WarehouseLedgerMonth[];
};

export type SiteLedgerMonth = {
  month: MonthKey;
  inbound: number;
  cumulative: number;
};

export type SiteLedger = {
  site: string;
  openingCumulative: number;
  deltasAfterRange: number;
  months: SiteLedgerMonth[];
};

export type MonthRange = {
  start: MonthKey;
  end: MonthKey;
};

export type CaseFlowLedgers = {
  range: MonthRange;
  warehouses: WarehouseLedger[];
  sites: SiteLedger[];
};

export type DeadStockTier = {
  name: string;
  minDays: number;
};

export type DeadStockRecord = {
  caseId: string;
  lastWarehouse: string;
  lastWarehouseAt: Date;
  elapsedDays: number;
  tier: string;
  quantity: number;
  category: string | null;
};

export type ParseWarning = {
  code: 'DATE_PARSE_FAILED' | 'QUANTITY_PARSE_FAILED';
  caseId: string;
  column: string;
  value: string;
};

export type EmptyCaseWarning = {
  code: 'EMPTY_CASE';
  caseId: string;
};

export type AnomalousTimelineWarning = {
  code: 'ANOMALOUS_TIMELINE';
  caseId: string;
  reason: TimelineAnomalyReason;
  location: string;
  at: Date;
};

export type InvalidRowWarning = {
  code: 'MISSING_CASE_ID' | 'DUPLICATE_CASE_ID';
  rowNumber: number;
  caseId: string | null;
};

export type UnresolvedColumnWarning = {
  code: 'UNRESOLVED_COLUMN';
  locationClass: LocationClass;
  name: string;
  column: string;
};

export type UnresolvedMetadataColumnWarning = {
  code: 'UNRESOLVED_METADATA_COLUMN';
  role: 'quantity' | 'category';
  column: string;
};

export type CaseFlowWarning =
  | ParseWarning
  | EmptyCaseWarning
  | AnomalousTimelineWarning
  | InvalidRowWarning
  | UnresolvedColumnWarning
  | UnresolvedMetadataColumnWarning;
