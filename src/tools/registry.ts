import { z } from 'zod';
import { zodToMcpInputSchema } from './mcpSchema.js';
import { resolveInputPath } from '../config.js';
import { readSumFile, scanSumFiles } from '../files/sumFiles.js';
import { FIELD_SPELLINGS, groupCasts, type SumRow } from '../sum/index.js';
import {
  SUM_READ_ROWS,
  SUM_READ_CASTS,
  SUM_SCAN_DIRECTORY,
  SUM_DESCRIBE_LAYOUT,
  SUM_LIST_ALIASES,
  type SumToolName,
} from '../constants.js';

export type ToolExposureMode = 'standard' | 'full';
export type ToolExposure = 'standard' | 'full';

export interface ToolSpec<TSchema extends z.ZodType = z.ZodType> {
  name: SumToolName;
  description: string;
  exposure: ToolExposure;
  zodSchema: TSchema;
  handler(params: z.output<TSchema>): Promise<unknown>;
}

export function isToolExposed(spec: ToolSpec, mode: ToolExposureMode): boolean {
  return mode === 'full' ? true : spec.exposure === 'standard';
}

function defineTool<TSchema extends z.ZodType>(spec: ToolSpec<TSchema>): ToolSpec {
  return spec;
}

// ── Tool Schemas ──────────────────────────────────────────────────────────

const EmptyColsSchema = z.array(z.string().min(1)).optional()
  .describe('Header labels whose columns are blank in every record (e.g. ["BOTTLES"])');

const SumPathSchema = z.string().min(1)
  .describe('Path to a sum file (absolute, or relative to SUMFILE_DATA_DIR)');

const SumReadRowsSchema = z.object({
  path: SumPathSchema,
  empty_cols: EmptyColsSchema,
  offset: z.number().int().min(0).optional().default(0).describe('Number of records to skip'),
  limit: z.number().int().min(1).max(1000).optional().default(100).describe('Maximum records returned'),
});

const SumReadCastsSchema = z.object({
  path: SumPathSchema,
  empty_cols: EmptyColsSchema,
});

const SumScanDirectorySchema = z.object({
  path: z.string().min(1).describe('Directory to search for *.sum and *su.txt files'),
  empty_cols: EmptyColsSchema,
});

const SumDescribeLayoutSchema = z.object({
  path: SumPathSchema,
  empty_cols: EmptyColsSchema,
});

const SumListAliasesSchema = z.object({});

// ── Tool Specs ────────────────────────────────────────────────────────────

export const TOOL_SPECS: ToolSpec[] = [
  defineTool({
    name: SUM_READ_ROWS,
    description: 'Decode a WOCE sum file into one record per body line (lat/lon in signed degrees, other fields as text).',
    exposure: 'standard',
    zodSchema: SumReadRowsSchema,
    handler: async (params) => {
      const filePath = resolveInputPath(params.path, 'file');
      const { layout, rows } = readSumFile(filePath, { emptyCols: params.empty_cols });

      const page: SumRow[] = [];
      let total = 0;
      for (const row of rows) {
        if (total >= params.offset && page.length < params.limit) page.push(row);
        total += 1;
      }
      return {
        path: filePath,
        fields: layout.fields,
        total_rows: total,
        offset: params.offset,
        rows: page,
      };
    },
  }),
  defineTool({
    name: SUM_READ_CASTS,
    description: 'Decode a WOCE sum file and group its records into casts by STNNBR/CASTNO, with one entry per event code.',
    exposure: 'standard',
    zodSchema: SumReadCastsSchema,
    handler: async (params) => {
      const filePath = resolveInputPath(params.path, 'file');
      const { rows } = readSumFile(filePath, { emptyCols: params.empty_cols });
      const casts = groupCasts(rows);
      return { path: filePath, cast_count: casts.length, casts };
    },
  }),
  defineTool({
    name: SUM_SCAN_DIRECTORY,
    description: 'Find sum files under a directory and report which ones decode, with record and cast counts.',
    exposure: 'standard',
    zodSchema: SumScanDirectorySchema,
    handler: async (params) => {
      const root = resolveInputPath(params.path, 'directory');
      return scanSumFiles(root, { emptyCols: params.empty_cols });
    },
  }),
  defineTool({
    name: SUM_DESCRIBE_LAYOUT,
    description: 'Show how a sum file header was resolved: labels, canonical fields, depth markers and body column count.',
    exposure: 'full',
    zodSchema: SumDescribeLayoutSchema,
    handler: async (params) => {
      const filePath = resolveInputPath(params.path, 'file');
      const { layout, slices, body } = readSumFile(filePath, { emptyCols: params.empty_cols });
      return {
        path: filePath,
        header_labels: layout.headerLabels,
        fields: layout.fields,
        empty_fields: [...layout.emptyFields],
        markers: layout.markers,
        column_count: slices.length,
        body_line_count: body.length,
      };
    },
  }),
  defineTool({
    name: SUM_LIST_ALIASES,
    description: 'List every recognised header label spelling grouped by canonical field.',
    exposure: 'full',
    zodSchema: SumListAliasesSchema,
    handler: async () => ({ fields: FIELD_SPELLINGS }),
  }),
];

// ── Exports ───────────────────────────────────────────────────────────────

export function getToolSpec(name: string): ToolSpec | undefined {
  return TOOL_SPECS.find(s => s.name === name);
}

export function getToolSpecs(mode: ToolExposureMode = 'standard'): ToolSpec[] {
  return mode === 'full' ? TOOL_SPECS : TOOL_SPECS.filter(s => s.exposure === 'standard');
}

export function getTools(mode: ToolExposureMode = 'standard'): Array<{
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}> {
  return getToolSpecs(mode).map(s => ({
    name: s.name,
    description: s.description,
    inputSchema: zodToMcpInputSchema(s.zodSchema),
  }));
}
