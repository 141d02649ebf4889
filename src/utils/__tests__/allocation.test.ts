import { describe, expect, test } from 'vitest'
import {
  EmptyAssignmentError,
  InvalidWeightError,
  UnassignedItemError,
} from '../../models/errors.js'
import type { Assignment, BillItem, CustomItem, LineItem } from '../../models/types.js'
import { allocate, distributeLargestRemainder } from '../allocation.js'
import { Fraction } from '../fraction.js'

function lineItem(name: string, extendedPrice: number, isTaxable: boolean, extra: Partial<LineItem> = {}): LineItem {
  return {
    kind: 'line',
    name,
    quantity: 1,
    unitPrice: extendedPrice,
    extendedPrice,
    isTaxable,
    sourceLineNumber: 1,
    unitPriceSource: 'printed',
    corrected: false,
    ...extra,
  }
}

function even(...people: string[]): Map<string, number> {
  return new Map(people.map((id): [string, number] => [id, 1]))
}

function assignment(...perItem: Map<string, number>[]): Assignment {
  return new Map(perItem.map((weights, index): [number, Map<string, number>] => [index, weights]))
}

const MILK = lineItem('Milk', 350, true)
const BREAD = lineItem('Bread', 400, false, { quantity: 2, unitPrice: 200 })

describe('allocate', () => {
  test('splits the store receipt between two people', () => {
    const result = allocate({
      items: [MILK, BREAD],
      assignment: assignment(even('Alice'), even('Alice', 'Bob')),
      taxAmount: 28,
      declaredGrandTotal: 778,
    })

    expect(result.people.get('Alice')).toEqual({ personId: 'Alice', itemShare: 550, taxShare: 28, total: 578 })
    expect(result.people.get('Bob')).toEqual({ personId: 'Bob', itemShare: 200, taxShare: 0, total: 200 })
    expect(result.allocatedTotal).toBe(778)
    expect(result.roundingAdjustment).toBe(0)
    expect(result.residual).toBe(0)
    expect(result.warnings).toEqual([])
  })

  test('splits the net price of a discounted item', () => {
    const bread = lineItem('Bread', 400, false, { discount: -50 })
    const result = allocate({ items: [bread], assignment: assignment(even('Alice', 'Bob')), taxAmount: 0 })

    expect(result.people.get('Alice')?.itemShare).toBe(175)
    expect(result.people.get('Bob')?.itemShare).toBe(175)
  })

  test('gives a leftover cent to the lowest person id when remainders tie', () => {
    const result = allocate({
      items: [lineItem('Pizza', 100, false)],
      assignment: assignment(even('carol', 'bob', 'alice')),
      taxAmount: 0,
    })

    expect(result.people.get('alice')?.total).toBe(34)
    expect(result.people.get('bob')?.total).toBe(33)
    expect(result.people.get('carol')?.total).toBe(33)
    expect(result.roundingAdjustment).toBe(1)
  })

  test('reports what each person pays for each item', () => {
    const result = allocate({
      items: [MILK, BREAD],
      assignment: assignment(even('Alice'), new Map([['Alice', 1], ['Bob', 2]])),
      taxAmount: 28,
    })

    expect(result.itemAmounts.get(0)).toEqual(new Map([['Alice', 350]]))
    expect(result.itemAmounts.get(1)).toEqual(new Map([['Alice', 133], ['Bob', 267]]))
  })

  test('takes an excess cent from the lowest person id when rounding overshoots', () => {
    const result = allocate({
      items: [lineItem('Pizza', 200, false)],
      assignment: assignment(even('alice', 'bob', 'carol')),
      taxAmount: 0,
    })

    expect(result.people.get('alice')?.total).toBe(66)
    expect(result.people.get('bob')?.total).toBe(67)
    expect(result.people.get('carol')?.total).toBe(67)
    expect(result.allocatedTotal).toBe(200)
  })

  test('honours unequal weights', () => {
    const twoToOne = allocate({
      items: [lineItem('Wine', 1000, false)],
      assignment: assignment(new Map([['Alice', 2], ['Bob', 1]])),
      taxAmount: 0,
    })
    expect(twoToOne.people.get('Alice')?.total).toBe(667)
    expect(twoToOne.people.get('Bob')?.total).toBe(333)

    const fractional = allocate({
      items: [lineItem('Cake', 300, false)],
      assignment: assignment(new Map([['Alice', 0.5], ['Bob', 0.25]])),
      taxAmount: 0,
    })
    expect(fractional.people.get('Alice')?.total).toBe(200)
    expect(fractional.people.get('Bob')?.total).toBe(100)
  })

  test('spreads tax over taxable consumption only', () => {
    const result = allocate({
      items: [
        lineItem('Steak', 1000, true),
        lineItem('Salad', 500, true),
        lineItem('Juice', 700, false),
      ],
      assignment: assignment(even('Alice'), even('Bob', 'Carol'), even('Dave')),
      taxAmount: 100,
    })

    expect(result.people.get('Alice')).toEqual({ personId: 'Alice', itemShare: 1000, taxShare: 66, total: 1066 })
    expect(result.people.get('Bob')).toEqual({ personId: 'Bob', itemShare: 250, taxShare: 17, total: 267 })
    expect(result.people.get('Carol')).toEqual({ personId: 'Carol', itemShare: 250, taxShare: 17, total: 267 })
    expect(result.people.get('Dave')).toEqual({ personId: 'Dave', itemShare: 700, taxShare: 0, total: 700 })
    expect(result.allocatedTotal).toBe(2300)
  })

  test('warns when there is tax but nothing taxable', () => {
    const result = allocate({
      items: [lineItem('Juice', 700, false)],
      assignment: assignment(even('Dave')),
      taxAmount: 50,
    })

    expect(result.people.get('Dave')).toEqual({ personId: 'Dave', itemShare: 700, taxShare: 0, total: 700 })
    expect(result.warnings).toEqual([
      { kind: 'UNALLOCATED_TAX', detail: 'No taxable items are assigned, so 50 minor units of tax were not allocated' },
    ])
  })

  test('rejects an item with no assignment entry', () => {
    const run = () => allocate({ items: [MILK, BREAD], assignment: assignment(even('Alice')), taxAmount: 28 })

    expect(run).toThrow(UnassignedItemError)
    expect(run).toThrow('Item 2 "Bread" is not assigned to anyone')
  })

  test('rejects an item assigned to nobody', () => {
    const run = () => allocate({ items: [MILK], assignment: assignment(new Map()), taxAmount: 0 })

    expect(run).toThrow(EmptyAssignmentError)
  })

  test.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects weight %s', weight => {
    const run = () => allocate({
      items: [MILK],
      assignment: assignment(new Map([['Alice', 1], ['Bob', weight]])),
      taxAmount: 0,
    })

    expect(run).toThrow(InvalidWeightError)
  })

  test('reads extreme weights exactly', () => {
    const large = allocate({
      items: [lineItem('Wine', 100, false)],
      assignment: assignment(new Map([['Alice', 1e21], ['Bob', 1]])),
      taxAmount: 0,
    })
    expect(large.people.get('Alice')?.total).toBe(100)
    expect(large.people.get('Bob')?.total).toBe(0)

    const tiny = allocate({
      items: [lineItem('Wine', 100, false)],
      assignment: assignment(new Map([['Alice', 1e-10], ['Bob', 1e-10]])),
      taxAmount: 0,
    })
    expect(tiny.people.get('Alice')?.total).toBe(50)
    expect(tiny.people.get('Bob')?.total).toBe(50)
  })

  test('returns the same result for the same input', () => {
    const input = {
      items: [MILK, BREAD],
      assignment: assignment(even('Alice', 'Bob', 'Carol'), even('Bob', 'Carol')),
      taxAmount: 28,
    }

    expect(allocate(input)).toEqual(allocate(input))
  })

  test('always allocates every item and tax cent', () => {
    const names = ['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7']
    for (const price of [1, 7, 100, 999, 12345]) {
      for (let count = 1; count <= names.length; count++) {
        const result = allocate({
          items: [lineItem('Thing', price, true)],
          assignment: assignment(even(...names.slice(0, count))),
          taxAmount: 13,
        })
        const people = Array.from(result.people.values())

        expect(people.reduce((sum, p) => sum + p.itemShare, 0)).toBe(price)
        expect(people.reduce((sum, p) => sum + p.taxShare, 0)).toBe(13)
        expect(result.allocatedTotal).toBe(price + 13)
      }
    }
  })

  test('counts custom items when comparing with the receipt total', () => {
    const delivery: CustomItem = {
      kind: 'custom',
      name: 'Delivery',
      quantity: 1,
      unitPrice: 500,
      extendedPrice: 500,
      isTaxable: false,
    }
    const items: BillItem[] = [MILK, BREAD, delivery]
    const result = allocate({
      items,
      assignment: assignment(even('Alice'), even('Alice', 'Bob'), even('Bob')),
      taxAmount: 28,
      declaredGrandTotal: 778,
    })

    expect(result.allocatedTotal).toBe(1278)
    expect(result.residual).toBe(0)
  })

  test('reports a residual against the printed total', () => {
    const result = allocate({
      items: [MILK],
      assignment: assignment(even('Alice')),
      taxAmount: 28,
      declaredGrandTotal: 400,
    })

    expect(result.allocatedTotal).toBe(378)
    expect(result.residual).toBe(22)
    expect(result.warnings).toEqual([
      { kind: 'DECLARED_TOTAL_MISMATCH', detail: 'Allocated total differs from the receipt total by 22 minor units' },
    ])
  })

  test('lists named people who have nothing assigned', () => {
    const result = allocate({
      items: [MILK],
      assignment: assignment(even('Alice')),
      taxAmount: 28,
      people: ['Zoe', 'Alice'],
    })

    expect(result.people.get('Zoe')).toEqual({ personId: 'Zoe', itemShare: 0, taxShare: 0, total: 0 })
    expect(result.people.get('Alice')?.total).toBe(378)
  })
})

describe('distributeLargestRemainder', () => {
  test('breaks remainder ties by person id, not insertion order', () => {
    const half = Fraction.of(1, 2)
    const { rounded, adjustment } = distributeLargestRemainder(new Map([['b', half], ['a', half]]), 1n)

    expect(rounded.get('a')).toBe(1n)
    expect(rounded.get('b')).toBe(0n)
    expect(adjustment).toBe(1)
  })

  test('leaves exact shares alone', () => {
    const { rounded, adjustment } = distributeLargestRemainder(
      new Map([['a', Fraction.of(150)], ['b', Fraction.of(250)]]),
      400n
    )

    expect(Array.from(rounded.entries())).toEqual([['a', 150n], ['b', 250n]])
    expect(adjustment).toBe(0)
  })
})
