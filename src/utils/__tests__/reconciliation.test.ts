import { describe, expect, test } from 'vitest'
import { parseReceipt } from '../parser.js'
import { reconcileReceipt } from '../reconciliation.js'

function check(text: string) {
  const parsed = parseReceipt(text)
  return reconcileReceipt(parsed.items, parsed.totals)
}

describe('reconcileReceipt', () => {
  test('passes a receipt whose arithmetic adds up', () => {
    const report = check(`Milk 3.50 T
Bread 2 @ 2.00 4.00 N
SUBTOTAL 7.50
TAX 0.28
TOTAL 7.78`)

    expect(report.anomalies).toEqual([])
    expect(report.corrections).toEqual([])
    expect(report.itemSubtotal).toBe(750)
    expect(report.balanced).toBe(true)
  })

  test('re-derives an extended price when that makes the subtotal match', () => {
    const report = check(`Yogurt 3 @ 1.00 30.00 N
Milk 3.50 T
SUBTOTAL 6.50
TAX 0.28
TOTAL 6.78`)

    expect(report.items[0]).toMatchObject({
      extendedPrice: 300,
      originalExtendedPrice: 3000,
      corrected: true,
      correctedBy: 'reconciliation',
    })
    expect(Object.isFrozen(report.items[0])).toBe(true)
    expect(report.corrections).toEqual([{ itemIndex: 0, field: 'extendedPrice', from: 3000, to: 300 }])
    expect(report.anomalies).toEqual([
      {
        kind: 'QUANTITY_MISMATCH',
        itemIndex: 0,
        lineNumber: 1,
        detail: '3 × $1.00 = $3.00, but the line shows $30.00; corrected to $3.00 to match the subtotal',
      },
    ])
    expect(report.itemSubtotal).toBe(650)
    expect(report.balanced).toBe(true)
  })

  test('records a quantity mismatch without overwriting when nothing confirms it', () => {
    const report = check(`Yogurt 3 @ 1.00 30.00 N
Milk 3.50`)

    expect(report.items[0]).toMatchObject({ extendedPrice: 3000, corrected: false })
    expect(report.corrections).toEqual([])
    expect(report.anomalies.map(a => a.kind)).toEqual(['QUANTITY_MISMATCH'])
    expect(report.balanced).toBe(true)
  })

  test('flags a subtotal that the items do not reach', () => {
    const report = check(`Milk 3.50
Bread 4.00
SUBTOTAL 8.00
TAX 0.00
TOTAL 8.00`)

    expect(report.anomalies).toEqual([
      { kind: 'SUBTOTAL_MISMATCH', detail: 'Items add up to $7.50 but the receipt subtotal is $8.00' },
    ])
    expect(report.balanced).toBe(false)
    expect(report.items).toHaveLength(2)
  })

  test('flags a total that is not subtotal plus tax', () => {
    const report = check(`Milk 3.50
SUBTOTAL 3.50
TAX 0.28
TOTAL 4.00`)

    expect(report.anomalies).toEqual([
      { kind: 'TOTAL_MISMATCH', detail: 'Subtotal $3.50 + tax $0.28 = $3.78, but the receipt total is $4.00' },
    ])
    expect(report.balanced).toBe(false)
  })

  test('tolerates a difference of one minor unit', () => {
    const report = check(`Milk 3.50
TOTAL 3.51`)

    expect(report.anomalies).toEqual([])
  })

  test('does not quantity-check weighed or discounted items', () => {
    const report = check(`Bananas 2.31 lb @ 0.58 /lb 1.34 N
Bread 2 @ 2.00 3.50 N
Coupon -0.50`)

    expect(report.anomalies).toEqual([])
  })
})
