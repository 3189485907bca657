import Papa from "papaparse";
import { z } from "zod";

export type ParseReport<T> = {
  rows: T[];
  errors: { row: number; message: string }[];
  rowCount: number;
  droppedRows: number;
  unknownColumns: string[];
};

// CSV parser with header aliasing + row validation
export function parseCsv<T extends z.ZodRawShape>(
  input: string,
  schema: z.ZodObject<T>,
  aliases: Record<string, keyof z.infer<z.ZodObject<T>>>
): ParseReport<z.infer<typeof schema>> {
  const rows: z.infer<typeof schema>[] = [];
  const errors: { row: number; message: string }[] = [];
  let droppedRows = 0;

  const result = Papa.parse<Record<string, unknown>>(input, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  const unknownColumns = (result.meta.fields ?? []).filter((h) => !(h.toLowerCase() in aliases));

  result.data.forEach((raw, i) => {
    const rowNum = i + 1;

    // Map aliases → canonical keys
    const mapped: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(raw)) {
      const target = aliases[key.toLowerCase()];
      if (!target) continue;
      mapped[String(target)] = val;
    }

    const parsed = schema.safeParse(mapped);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      droppedRows += 1;
      const msg = parsed.error.issues.map((iss) => `${iss.path.join(".")}: ${iss.message}`).join("; ");
      errors.push({ row: rowNum, message: msg });
    }
  });

  for (const err of result.errors) {
    errors.push({ row: (err.row ?? -1) + 1, message: `csv: ${err.message}` });
  }

  return {
    rows,
    errors,
    rowCount: result.data.length,
    droppedRows,
    unknownColumns,
  };
}
