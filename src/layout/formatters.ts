/**
 * Groups the integer part with commas: `1234567` → `1,234,567`
 */
export function groupThousands(digits: string): string {
  const negative = digits.startsWith('-')
  const [integer = '', fraction] = (negative ? digits.slice(1) : digits).split('.')
  const grouped = integer.replace(/\B(?=(\d{3})+(?!\d))/g, ',')
  return `${negative ? '-' : ''}${grouped}${fraction !== undefined ? `.${fraction}` : ''}`
}

/**
 * Price text for labels and the statistics table.
 * Whole units from 100 upwards, cents from 1, four significant digits below that.
 */
export function formatPrice(price: number): string {
  const magnitude = Math.abs(price)
  if (magnitude >= 100) {
    return groupThousands(Math.round(price).toString())
  }
  if (magnitude >= 1) {
    return price.toFixed(2)
  }
  return price.toPrecision(4)
}

/**
 * Rounds an axis label value to a step that suits its magnitude
 */
export function roundAxisPrice(price: number): number {
  if (price >= 100000) return Math.round(price / 500) * 500
  if (price >= 10000) return Math.round(price / 100) * 100
  if (price >= 1000) return Math.round(price / 50) * 50
  if (price >= 100) return Math.round(price / 10) * 10
  return price
}

export function formatAxisPrice(price: number): string {
  return `$${formatPrice(roundAxisPrice(price))}`
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`
}

const pad = (value: number): string => value.toString().padStart(2, '0')

/**
 * `MM-DD HH:mm` in UTC
 */
export function formatAxisTime(timestamp: number): string {
  const date = new Date(timestamp)
  return `${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
}
