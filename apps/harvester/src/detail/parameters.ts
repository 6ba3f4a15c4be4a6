/**
 * Ad parameter list ("Quilómetros: 150 000 km") to raw record fields.
 */

import type { RawRecord } from '../types.js'

type ParameterField =
  | 'brand'
  | 'model'
  | 'year'
  | 'mileage'
  | 'fuel_type'
  | 'transmission'
  | 'power'
  | 'engine_size'
  | 'doors'
  | 'seats'
  | 'color'
  | 'body_type'
  | 'condition'
  | 'segment'
  | 'first_registration'
  | 'registration_month'
  | 'origin'
  | 'drivetrain'
  | 'co2_emissions'
  | 'fuel_consumption'
  | 'inspection'

/** Lower-cased, accent-stripped label -> field */
const LABELS: Record<string, ParameterField> = {
  marca: 'brand',
  modelo: 'model',
  ano: 'year',
  quilometros: 'mileage',
  combustivel: 'fuel_type',
  'tipo de caixa': 'transmission',
  'caixa de velocidades': 'transmission',
  potencia: 'power',
  cilindrada: 'engine_size',
  portas: 'doors',
  'numero de portas': 'doors',
  lugares: 'seats',
  cor: 'color',
  'tipo de carrocaria': 'body_type',
  condicao: 'condition',
  estado: 'condition',
  segmento: 'segment',
  'data de registo': 'first_registration',
  'mes de registo': 'registration_month',
  origem: 'origin',
  tracao: 'drivetrain',
  'emissoes co2': 'co2_emissions',
  consumo: 'fuel_consumption',
  inspecao: 'inspection',
}

/** Fields whose value keeps its raw text next to the digits-only number */
const NUMERIC_WITH_RAW = new Set<ParameterField>(['mileage', 'power'])
const DIGITS_ONLY = new Set<ParameterField>(['doors', 'seats', 'year'])

/** Bare items without a label that name the seller kind */
const SELLER_TYPES = new Set(['particular', 'profissional'])

export function normalizeLabel(label: string): string {
  return label
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[º°.]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
}

export function fieldForLabel(label: string): ParameterField | undefined {
  return LABELS[normalizeLabel(label)]
}

/**
 * Map "Label: Value" items onto raw fields. Unknown labels are kept
 * under `parameters` so nothing on the page is silently lost.
 */
export function parseParameters(items: readonly string[]): RawRecord {
  const record: RawRecord = {}
  const unmapped: Record<string, string> = {}

  for (const item of items) {
    const separator = item.indexOf(':')
    if (separator === -1) {
      const bare = item.trim().toLowerCase()
      if (SELLER_TYPES.has(bare)) record.seller_type = item.trim()
      continue
    }

    const label = item.slice(0, separator).trim()
    const value = item.slice(separator + 1).trim()
    if (!label || !value) continue

    const field = fieldForLabel(label)
    if (!field) {
      unmapped[label] = value
      continue
    }

    if (NUMERIC_WITH_RAW.has(field)) {
      record[`${field}_raw`] = value
      record[field] = value.replace(/\D/g, '')
    } else if (field === 'engine_size') {
      // "1 995 cm³" -> "1995", "1.6" stays a litre figure
      record[field] = value.replace(/cm3|cm³|cc/gi, '').replace(/[^\d,.]/g, '')
    } else if (DIGITS_ONLY.has(field)) {
      record[field] = value.replace(/\D/g, '')
    } else {
      record[field] = value
    }
  }

  if (Object.keys(unmapped).length > 0) {
    record.parameters = unmapped
  }
  return record
}
