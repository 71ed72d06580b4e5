import { config } from 'dotenv';
import {
  getCaseFlowGateConfig,
  getCaseFlowRunConfig,
  getCaseFlowSourceConfig,
  type CaseFlowSourceConfig
} from '../src/config/caseFlow';
import { loadLocationCatalog } from '../src/config/locationCatalog';
import { closePool } from '../src/db';
import { isConfigurationError } from '../src/domains/caseFlow';
import { runCaseFlow, serializeReport } from '../src/services/caseFlowReport.service';
import {
  loadCaseRowsFromCsvFile,
  loadCaseRowsFromTable,
  type CaseTable
} from '../src/services/caseSources.service';
import type { LocationCatalog } from '../src/schemas/caseFlow.schema';

config();

async function loadTable(source: CaseFlowSourceConfig, catalog: LocationCatalog): Promise<CaseTable> {
  if (source.kind === 'pg') {
    try {
      return await loadCaseRowsFromTable(catalog, { table: source.table });
    } finally {
      await closePool();
    }
  }
  const csvPath = process.argv[2] ?? source.path;
  if (!csvPath) {
    throw new Error('Pass a CSV path as the first argument or set CASE_FLOW_CSV_PATH.');
  }
  return loadCaseRowsFromCsvFile(csvPath);
}

async function run() {
  const source = getCaseFlowSourceConfig();
  const catalog = await loadLocationCatalog(source.catalogPath);
  const table = await loadTable(source, catalog);
  if (table.truncated) {
    console.warn(`Case table truncated to ${table.rows.length} rows.`);
  }

  const report = runCaseFlow(table, catalog, getCaseFlowRunConfig());
  console.log(serializeReport(report));

  const gate = getCaseFlowGateConfig();
  const urgent = report.deadStock.records.filter((record) => record.tier === gate.urgentTier);
  if (gate.failOnUrgent && urgent.length > 0) {
    console.error(`${urgent.length} case(s) in ${gate.urgentTier} dead stock.`);
    process.exit(2);
  }
  process.exit(0);
}

run().catch((err) => {
  if (isConfigurationError(err)) {
    console.error(`${err.code}: ${JSON.stringify(err.details ?? {})}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
