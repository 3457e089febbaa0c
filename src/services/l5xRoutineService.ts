import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { RoutineSnapshot, RoutineSource, RungSource } from '../types';

const CDATA_KEY = '__cdata';

const parserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  cdataPropName: CDATA_KEY,
  trimValues: true,
  parseAttributeValue: false,
  isArray: (name: string) => name === 'Routine' || name === 'Rung'
};

const builderOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  cdataPropName: CDATA_KEY,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
  // L5X carries literal 'true'/'false' attribute values.
  suppressBooleanAttributes: false
};

const textValue = z.union([z.string(), z.number(), z.object({ [CDATA_KEY]: z.union([z.string(), z.number()]) })]);

const rungSchema = z.object({
  '@_Number': z.string().optional(),
  '@_Type': z.string().optional(),
  Comment: textValue.optional(),
  Text: textValue.optional()
});

const routineSchema = z.object({
  '@_Name': z.string().optional(),
  '@_Type': z.string().optional(),
  RLLContent: z.union([z.object({ Rung: z.array(rungSchema).optional() }), z.literal('')]).optional()
});

type RoutineNode = z.infer<typeof routineSchema>;

export class L5xFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'L5xFormatError';
  }
}

export interface L5xExportOptions {
  programName?: string;
}

function readText(value: z.infer<typeof textValue> | undefined): string {
  if (value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return String(value[CDATA_KEY]).trim();
  }
  return String(value).trim();
}

function collectRoutines(node: unknown, found: unknown[]): void {
  if (Array.isArray(node)) {
    node.forEach(child => collectRoutines(child, found));
    return;
  }
  if (typeof node !== 'object' || node === null) {
    return;
  }
  for (const [key, value] of Object.entries(node)) {
    if (key === 'Routine' && Array.isArray(value)) {
      found.push(...value);
    } else {
      collectRoutines(value, found);
    }
  }
}

/** Reads and writes ladder (RLL) routines in L5X export files. */
export class L5xRoutineService {
  private readonly parser = new XMLParser(parserOptions);
  private readonly builder = new XMLBuilder(builderOptions);

  public listRoutines(xml: string): string[] {
    return this.ladderRoutines(xml).map((routine, index) => routine['@_Name'] ?? `Routine${index}`);
  }

  public parseRoutine(xml: string, routineName?: string): RoutineSource {
    const routines = this.ladderRoutines(xml);
    const routine = routineName === undefined
      ? routines[0]
      : routines.find(candidate => candidate['@_Name'] === routineName);
    if (!routine) {
      throw new L5xFormatError(
        routineName === undefined ? 'No ladder routine found in L5X content.' : `Ladder routine '${routineName}' not found.`
      );
    }

    const content = routine.RLLContent;
    const rungs: RungSource[] = (content === undefined || content === '' ? [] : content.Rung ?? []).map(rung => {
      const comment = readText(rung.Comment);
      return {
        text: readText(rung.Text),
        ...(comment !== '' ? { comment } : {})
      };
    });
    return { name: routine['@_Name'], rungs };
  }

  public buildRoutine(snapshot: RoutineSnapshot, options: L5xExportOptions = {}): string {
    const rungs = snapshot.rungs.map(rung => ({
      '@_Number': String(rung.number),
      '@_Type': 'N',
      ...(rung.comment !== undefined ? { Comment: { [CDATA_KEY]: rung.comment } } : {}),
      Text: { [CDATA_KEY]: rung.text }
    }));
    const document = {
      '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8', '@_standalone': 'yes' },
      RSLogix5000Content: {
        '@_SchemaRevision': '1.0',
        '@_TargetType': 'Routine',
        '@_TargetName': snapshot.name,
        '@_ContainsContext': 'true',
        Controller: {
          '@_Use': 'Context',
          Programs: {
            '@_Use': 'Context',
            Program: {
              '@_Use': 'Context',
              '@_Name': options.programName ?? 'MainProgram',
              Routines: {
                '@_Use': 'Context',
                Routine: {
                  '@_Use': 'Target',
                  '@_Name': snapshot.name,
                  '@_Type': 'RLL',
                  RLLContent: { Rung: rungs }
                }
              }
            }
          }
        }
      }
    };
    return this.builder.build(document);
  }

  private ladderRoutines(xml: string): RoutineNode[] {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new L5xFormatError(`Invalid L5X content at line ${validation.err.line}: ${validation.err.msg}`);
    }
    const found: unknown[] = [];
    collectRoutines(this.parser.parse(xml), found);
    return found
      .flatMap(candidate => {
        const parsed = routineSchema.safeParse(candidate);
        return parsed.success ? [parsed.data] : [];
      })
      .filter(routine => routine['@_Type'] === undefined || routine['@_Type'] === 'RLL');
  }
}
