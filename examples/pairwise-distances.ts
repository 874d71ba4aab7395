/**
 * Pairwise Distance Matrix Example
 *
 * This example demonstrates:
 * - Packing a symmetric distance matrix into a Float64Array of n(n-1)/2 slots
 * - Writing each pair once through a symmetric view
 * - Reading whole rows (both halves of the mirror) without an n x n buffer
 * - Nearest-neighbour queries over packed rows
 */

import { PackedArray, SymmetricUpperTriMut, Logger, packedSize } from '@trimat/core'

// ==================== Configuration ====================
const CONFIG = {
  cities: ['Aston', 'Brill', 'Cowley', 'Deddington', 'Eynsham', 'Fringford'],
  // Planar coordinates in km
  positions: [
    [0, 0],
    [12, 5],
    [3, 9],
    [20, 18],
    [-6, 4],
    [15, -8],
  ] satisfies Array<[number, number]>,
}

Logger.setLevel(process.env.TRIMAT_DEBUG === '1' ? 'debug' : 'info')

// ==================== Build ====================
const n = CONFIG.cities.length
const data = new Float64Array(packedSize(n, false))
const distances = new SymmetricUpperTriMut(PackedArray.wrap(n, data))

for (const [i, j] of distances.triangleIndices()) {
  const [xi, yi] = CONFIG.positions[i]
  const [xj, yj] = CONFIG.positions[j]
  distances.setElement(i, j, Math.hypot(xi - xj, yi - yj))
}

Logger.info(`Packed ${n}x${n} distances into ${data.length} slots (${data.byteLength} bytes)`)

// ==================== Query ====================
for (let i = 0; i < n; i++) {
  // getRow yields the other n - 1 cities in ascending order
  const others = CONFIG.cities.filter((_, k) => k !== i)
  const row = distances.getRow(i).toArray()

  let nearest = 0
  for (let k = 1; k < row.length; k++) {
    if (row[k] < row[nearest]) nearest = k
  }

  const total = row.reduce((a, b) => a + b, 0)
  Logger.info(
    `${CONFIG.cities[i].padEnd(11)} nearest ${others[nearest].padEnd(11)} ` +
      `${row[nearest].toFixed(1).padStart(5)} km, mean ${(total / row.length).toFixed(1)} km`,
  )
}

// Either side of the diagonal reads the same slot
const a = CONFIG.cities.indexOf('Brill')
const b = CONFIG.cities.indexOf('Fringford')
Logger.info(`Brill -> Fringford ${distances.getElement(a, b).toFixed(1)} km`)
Logger.info(`Fringford -> Brill ${distances.getElement(b, a).toFixed(1)} km`)
