const { mockFetch } = vi.hoisted(() => ({ mockFetch: vi.fn() }))

vi.mock('node-fetch', () => ({
  default: mockFetch,
}))

import { describe, it, expect, vi, beforeEach } from 'vitest'

import {
  InvalidFilterFieldError,
  JSONError,
  MissingRequiredFieldError,
  UnsupportedWildcardError,
} from '../../src/errors.js'
import {
  compareGeographies,
  Geography,
  searchGeography,
} from '../../src/models/geography.model.js'
import { CensusApiService } from '../../src/services/censusApi.service.js'
import { createMockResponse } from '../helpers/test-utils.js'
import { ACS5_URL, BASE_URL, sampleGeography } from '../helpers/test-data.js'

const GEO_URL = `${ACS5_URL}/geography.json`

const county = new Geography({
  name: 'county',
  geoLevel: '050',
  referenceDate: new Date(Date.UTC(2022, 0, 1)),
  requires: ['state'],
  wildcard: ['state'],
  optionalWildcard: 'state',
})

const tract = new Geography({
  name: 'tract',
  geoLevel: '140',
  referenceDate: new Date(Date.UTC(2022, 0, 1)),
  requires: ['state', 'county'],
  wildcard: ['county'],
  optionalWildcard: 'county',
})

const place = new Geography({
  name: 'place',
  geoLevel: '160',
  referenceDate: new Date(Date.UTC(2022, 0, 1)),
  requires: ['state'],
})

describe('Geography', () => {
  it('should build from a fips entry', () => {
    const geography = Geography.fromEntry(sampleGeography.fips[2])

    expect(geography.name).toBe('county')
    expect(geography.geoLevel).toBe('050')
    expect(geography.referenceDate.getTime()).toBe(Date.UTC(2022, 0, 1))
    expect(geography.requires).toEqual(['state'])
    expect(geography.wildcard).toEqual(['state'])
    expect(geography.optionalWildcard).toBe('state')
  })

  it('should default the optional fips fields', () => {
    const geography = Geography.fromEntry(sampleGeography.fips[0])

    expect(geography.requires).toEqual([])
    expect(geography.wildcard).toEqual([])
    expect(geography.optionalWildcard).toBe('')
    expect(geography.complexity).toBe(1)
  })

  it('should derive complexity from the required fields', () => {
    expect(county.complexity).toBe(2)
    expect(tract.complexity).toBe(3)
  })

  it('should order geographies by numeric level', () => {
    expect(county.sortIndex).toBe(50)
    expect(compareGeographies(county, tract)).toBeLessThan(0)
    expect(compareGeographies(tract, county)).toBeGreaterThan(0)
    expect(compareGeographies(place, place)).toBe(0)
    expect([place, tract, county].sort(compareGeographies)).toEqual([
      county,
      tract,
      place,
    ])
  })

  it('should expose only name and geoLevel as filterable', () => {
    expect(county.filterableAttrs).toEqual(['name', 'geoLevel'])
  })
})

describe('Geography.filterToParams', () => {
  it('should request every unit without filters', () => {
    expect(county.filterToParams()).toEqual([['for', 'county:*']])
  })

  it('should comma-join repeated fields and split for / in', () => {
    expect(
      county.filterToParams([
        ['county', '001'],
        ['state', '06'],
        ['county', '003'],
      ]),
    ).toEqual([
      ['for', 'county:001,003'],
      ['in', 'state:06'],
    ])
  })

  it('should keep in params in first-seen order', () => {
    expect(
      tract.filterToParams([
        ['county', '001'],
        ['tract', '400100'],
        ['state', '06'],
      ]),
    ).toEqual([
      ['for', 'tract:400100'],
      ['in', 'county:001'],
      ['in', 'state:06'],
    ])
  })

  it('should fail when a required field is missing', () => {
    expect(() =>
      tract.filterToParams([
        ['tract', '*'],
        ['county', '001'],
      ]),
    ).toThrow(MissingRequiredFieldError)
    expect(() => place.filterToParams([['place', '*']])).toThrow(
      "Required geography field 'state' not found in filters for 'place'",
    )
  })

  it('should fail when the geography itself is missing from the filters', () => {
    expect(() => place.filterToParams([['state', '06']])).toThrow(
      MissingRequiredFieldError,
    )
    expect(() => place.filterToParams([])).toThrow(MissingRequiredFieldError)
  })

  it('should allow omitting the optional wildcard field', () => {
    expect(county.filterToParams([['county', '*']])).toEqual([
      ['for', 'county:*'],
    ])
    expect(
      tract.filterToParams([
        ['tract', '*'],
        ['state', '06'],
      ]),
    ).toEqual([
      ['for', 'tract:*'],
      ['in', 'state:06'],
    ])
  })

  it('should succeed once the missing field is supplied', () => {
    expect(
      place.filterToParams([
        ['place', '*'],
        ['state', '06'],
      ]),
    ).toEqual([
      ['for', 'place:*'],
      ['in', 'state:06'],
    ])
  })

  it('should accept wildcards on fields that allow them', () => {
    expect(
      tract.filterToParams([
        ['tract', '*'],
        ['state', '06'],
        ['county', '*'],
      ]),
    ).toEqual([
      ['for', 'tract:*'],
      ['in', 'state:06'],
      ['in', 'county:*'],
    ])
  })

  it('should reject wildcards on fields that do not allow them', () => {
    expect(() =>
      tract.filterToParams([
        ['tract', '*'],
        ['state', '*'],
        ['county', '*'],
      ]),
    ).toThrow(UnsupportedWildcardError)
    expect(() =>
      place.filterToParams([
        ['place', '*'],
        ['state', '*'],
      ]),
    ).toThrow("Geography field 'state' does not accept wildcards for 'place'")
  })

  it('should fall back to a wildcard when the geography itself is optional', () => {
    const state = new Geography({
      name: 'state',
      geoLevel: '040',
      referenceDate: new Date(Date.UTC(2022, 0, 1)),
      optionalWildcard: 'state',
    })

    expect(state.filterToParams([])).toEqual([['for', 'state:*']])
  })
})

describe('searchGeography', () => {
  const api = new CensusApiService(BASE_URL)

  beforeEach(() => {
    mockFetch.mockReset()
    mockFetch.mockResolvedValue(createMockResponse(sampleGeography))
  })

  it('should return every geography sorted by level', async () => {
    const geographies = await searchGeography(GEO_URL, undefined, 'and', api)

    expect(geographies.map((geo) => geo.name)).toEqual([
      'us',
      'state',
      'county',
      'tract',
    ])
    expect(mockFetch).toHaveBeenCalledWith(GEO_URL)
  })

  it('should apply regex filters', async () => {
    const geographies = await searchGeography(
      GEO_URL,
      [['name', '^COUNTY$']],
      'and',
      api,
    )

    expect(geographies.map((geo) => geo.name)).toEqual(['county'])
  })

  it('should combine filters with or', async () => {
    const geographies = await searchGeography(
      GEO_URL,
      [
        ['name', 'tract'],
        ['geoLevel', '^040$'],
      ],
      'or',
      api,
    )

    expect(geographies.map((geo) => geo.name)).toEqual(['state', 'tract'])
  })

  it('should reject fields that are not filterable', async () => {
    await expect(
      searchGeography(GEO_URL, [['referenceDate', '2022']], 'and', api),
    ).rejects.toBeInstanceOf(InvalidFilterFieldError)
  })

  it('should return nothing when the document has no fips entries', async () => {
    mockFetch.mockResolvedValue(createMockResponse({}))

    await expect(searchGeography(GEO_URL, [], 'and', api)).resolves.toEqual([])
  })

  it('should reject malformed reference dates', async () => {
    mockFetch.mockResolvedValue(
      createMockResponse({
        fips: [{ name: 'state', geoLevelDisplay: '040', referenceDate: '01/01/2022' }],
      }),
    )

    await expect(searchGeography(GEO_URL, [], 'and', api)).rejects.toBeInstanceOf(
      JSONError,
    )
  })
})
