import { z } from 'zod'

/**
 * Device capability metadata: identity plus the model tables used to resolve
 * enum codes, reference codes and supported command keys
 */

export type Platform = 'thinq1' | 'thinq2'

export type ModelValue =
  | { type: 'enum'; options: Record<string, string> }
  | { type: 'reference'; table: string }
  | { type: 'other' }

export type ReferenceTable = Record<string, Record<string, unknown>>

export interface ModelInfo {
  productType: string | null
  values: Record<string, ModelValue>
  references: Record<string, ReferenceTable>
  controls: Record<string, Record<string, unknown>> | null
}

export interface DeviceDescriptor {
  deviceId: string
  alias: string
  modelName: string
  category: string
  platform: Platform
}

const v1ValueSchema = z.object({
  type: z.string(),
  option: z.unknown().optional(),
})

const enumOptionsSchema = z.record(z.string(), z.union([z.string(), z.number()]).transform(String))
const referenceOptionsSchema = z.array(z.string()).nonempty()

const v2ValueSchema = z.object({
  dataType: z.string().optional(),
  valueMapping: z
    .record(
      z.string(),
      z.object({
        index: z.union([z.string(), z.number()]).optional(),
        label: z.string().optional(),
      }),
    )
    .optional(),
  ref: z.string().optional(),
})

const modelInfoSchema = z
  .object({
    Info: z.object({ productType: z.string().optional() }).passthrough().optional(),
    Value: z.record(z.string(), v1ValueSchema).optional(),
    MonitoringValue: z.record(z.string(), v2ValueSchema).optional(),
    ControlWifi: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough()

// Top-level blocks that are never reference tables
const RESERVED_BLOCKS = new Set(['Info', 'Value', 'MonitoringValue', 'ControlWifi', 'Config', 'Module', 'Monitoring'])

export const EMPTY_MODEL: ModelInfo = {
  productType: null,
  values: {},
  references: {},
  controls: null,
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

function parseV1Value(value: z.infer<typeof v1ValueSchema>): ModelValue {
  const type = value.type.toLowerCase()
  if (type === 'enum') {
    const options = enumOptionsSchema.safeParse(value.option)
    if (options.success) {
      return { type: 'enum', options: options.data }
    }
  }
  if (type === 'reference') {
    const options = referenceOptionsSchema.safeParse(value.option)
    if (options.success) {
      return { type: 'reference', table: options.data[0] }
    }
  }
  return { type: 'other' }
}

function parseV2Value(value: z.infer<typeof v2ValueSchema>): ModelValue {
  if (value.ref) {
    return { type: 'reference', table: value.ref }
  }
  if (value.valueMapping) {
    const options: Record<string, string> = {}
    for (const [code, mapping] of Object.entries(value.valueMapping)) {
      const label = mapping.label ?? code
      options[code] = label
      if (mapping.index !== undefined) {
        options[String(mapping.index)] = label
      }
    }
    return { type: 'enum', options }
  }
  return { type: 'other' }
}

function extractReferenceTables(raw: Record<string, unknown>): Record<string, ReferenceTable> {
  const references: Record<string, ReferenceTable> = {}
  for (const [name, block] of Object.entries(raw)) {
    if (RESERVED_BLOCKS.has(name) || !isRecord(block)) continue

    const table: ReferenceTable = {}
    for (const [code, record] of Object.entries(block)) {
      if (isRecord(record)) {
        table[code] = record
      }
    }
    if (Object.keys(table).length > 0) {
      references[name] = table
    }
  }
  return references
}

/**
 * Parse a ThinQ model JSON document (v1 "Value" or v2 "MonitoringValue" layout)
 */
export function parseModelInfo(raw: unknown): ModelInfo {
  const parsed = modelInfoSchema.parse(raw)

  const values: Record<string, ModelValue> = {}
  for (const [key, value] of Object.entries(parsed.MonitoringValue ?? {})) {
    values[key] = parseV2Value(value)
  }
  // v1 definitions win when a model ships both
  for (const [key, value] of Object.entries(parsed.Value ?? {})) {
    values[key] = parseV1Value(value)
  }

  const controls: Record<string, Record<string, unknown>> = {}
  for (const [group, entry] of Object.entries(parsed.ControlWifi ?? {})) {
    if (isRecord(entry)) {
      controls[group] = entry
    }
  }

  return {
    productType: parsed.Info?.productType ?? null,
    values,
    references: extractReferenceTables(parsed),
    controls: parsed.ControlWifi ? controls : null,
  }
}

const isEmpty = (value: unknown) => value === undefined || value === null || value === ''

export class DeviceInfo {
  private readonly descriptor: DeviceDescriptor
  private readonly model: ModelInfo

  constructor(descriptor: DeviceDescriptor, model: ModelInfo = EMPTY_MODEL) {
    this.descriptor = descriptor
    this.model = model
  }

  public get deviceId(): string {
    return this.descriptor.deviceId
  }

  public get name(): string {
    return this.descriptor.alias
  }

  public get modelName(): string {
    return this.descriptor.modelName
  }

  public get category(): string {
    return this.descriptor.category
  }

  public get platform(): Platform {
    return this.descriptor.platform
  }

  public get productType(): string | null {
    return this.model.productType
  }

  public get hasControls(): boolean {
    return this.model.controls !== null
  }

  private definition(keys: string | readonly string[], type: ModelValue['type']): ModelValue | undefined {
    const aliases = typeof keys === 'string' ? [keys] : keys
    for (const alias of aliases) {
      const value = this.model.values[alias]
      if (value?.type === type) {
        return value
      }
    }
    return undefined
  }

  /**
   * Resolve a raw enum code to its label. Unknown codes resolve to the raw value itself.
   */
  public enumName(keys: string | readonly string[], code: unknown): string | null {
    if (isEmpty(code)) return null

    const definition = this.definition(keys, 'enum')
    if (definition?.type === 'enum') {
      const label = definition.options[String(code)]
      if (label !== undefined) {
        return label
      }
    }
    return String(code)
  }

  /**
   * Reverse enum lookup: the code whose label contains `label`, or `label` when no table has it
   */
  public enumValue(keys: string | readonly string[], label: string): string {
    const definition = this.definition(keys, 'enum')
    if (definition?.type === 'enum') {
      const match = Object.entries(definition.options).find(([, name]) => name.includes(label))
      if (match) {
        return match[0]
      }
    }
    return label
  }

  /**
   * Follow a reference code into its table and return the record's `refKey` attribute
   */
  public referenceName(keys: string | readonly string[], code: unknown, refKey = 'title'): string | null {
    if (isEmpty(code)) return null

    const definition = this.definition(keys, 'reference')
    if (definition?.type !== 'reference') {
      return String(code)
    }

    const record = this.model.references[definition.table]?.[String(code)]
    if (!record) {
      return String(code)
    }

    const name = record[refKey]
    return isEmpty(name) ? null : String(name)
  }

  public supportsCommand(group: string, command: string | null): boolean {
    const entry = this.model.controls?.[group]
    if (!entry) return false
    if (command === null) return true
    return command in entry || entry.command === command
  }
}
