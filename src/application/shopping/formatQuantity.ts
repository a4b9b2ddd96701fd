// Halves and thirds win over quarters, quarters over eighths: 0.5 prints
// as 1/2, never 4/8.
const DENOMINATORS = [2, 3, 4, 8]

const TOLERANCE = 0.02

function nearestFraction(part: number): string | null {
  for (const denominator of DENOMINATORS) {
    const numerator = Math.round(part * denominator)
    if (numerator === 0 || numerator === denominator) continue
    if (Math.abs(part - numerator / denominator) < TOLERANCE) return `${numerator}/${denominator}`
  }
  return null
}

/**
 * Shopping-list amount as a cook would write it: "1 1/2", "1/3", "2".
 * Anything that is not close to a kitchen fraction keeps one decimal.
 */
export function formatQuantity(value: number): string {
  if (value <= 0) return '0'

  const whole = Math.floor(value)
  const part = value - whole
  if (part < TOLERANCE) return String(whole)
  if (1 - part < TOLERANCE) return String(whole + 1)

  const fraction = nearestFraction(part)
  if (fraction) return whole > 0 ? `${whole} ${fraction}` : fraction

  return Number(value.toFixed(1)).toString()
}
