import { describe, it, expect, vi, afterEach } from 'vitest'
import { firstValueFrom } from 'rxjs'
import { basicAuthorization, fetchTransport } from './transport'
import type { PreparedRequest } from './request'

const fetchMock = vi.fn()

afterEach(() => {
  fetchMock.mockReset()
  vi.unstubAllGlobals()
})

function stubFetch(body: string, init: ResponseInit = { status: 200 }) {
  fetchMock.mockImplementation(() => Promise.resolve(new Response(body, init)))
  vi.stubGlobal('fetch', fetchMock)
}

const profileRequest: PreparedRequest = {
  method: 'POST',
  scheme: 'https',
  host: 'api.example.com',
  path: '/v2/profile?include_raw=true',
  headers: { Accept: 'application/json', 'Content-Type': 'text/plain' },
  body: new TextEncoder().encode('Call me Ishmael.'),
  credentials: { username: 'test-user', password: 'test-secret' },
}

describe('basicAuthorization()', () => {
  it('base64-encodes username:password', () => {
    expect(basicAuthorization({ username: 'user', password: 'pass' })).toBe('Basic dXNlcjpwYXNz')
  })
})

describe('fetchTransport', () => {
  it('sends method, url, headers, body and basic auth', async () => {
    stubFetch('{"id":"x"}')

    await firstValueFrom(fetchTransport(profileRequest))

    expect(fetchMock).toHaveBeenCalledTimes(1)
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('https://api.example.com/v2/profile?include_raw=true')
    expect(init.method).toBe('POST')
    expect(init.headers).toEqual({
      Accept: 'application/json',
      'Content-Type': 'text/plain',
      Authorization: basicAuthorization({ username: 'test-user', password: 'test-secret' }),
    })
    expect(new TextDecoder().decode(init.body)).toBe('Call me Ishmael.')
  })

  it('keeps a caller-supplied Authorization header', async () => {
    stubFetch('{}')

    await firstValueFrom(
      fetchTransport({ ...profileRequest, headers: { authorization: 'Bearer test-token' } }),
    )

    const [, init] = fetchMock.mock.calls[0]
    expect(init.headers).toEqual({ authorization: 'Bearer test-token' })
  })

  it('omits body and Authorization when absent', async () => {
    stubFetch('[]')

    await firstValueFrom(
      fetchTransport({ method: 'GET', scheme: 'http', host: 'localhost:8080', path: '/v1/classifiers', headers: {} }),
    )

    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('http://localhost:8080/v1/classifiers')
    expect(init.body).toBeUndefined()
    expect(init.headers).toEqual({})
  })

  it('emits status, headers and text body for any status', async () => {
    stubFetch('{"code":404,"error":"Not found"}', {
      status: 404,
      statusText: 'Not Found',
      headers: { 'Content-Type': 'application/json' },
    })

    const res = await firstValueFrom(fetchTransport(profileRequest))

    expect(res.status).toBe(404)
    expect(res.statusText).toBe('Not Found')
    expect(res.headers['content-type']).toBe('application/json')
    expect(res.body).toBe('{"code":404,"error":"Not found"}')
  })

  it('errors when fetch rejects', async () => {
    fetchMock.mockImplementation(() => Promise.reject(new TypeError('fetch failed')))
    vi.stubGlobal('fetch', fetchMock)

    await expect(firstValueFrom(fetchTransport(profileRequest))).rejects.toThrow('fetch failed')
  })
})
