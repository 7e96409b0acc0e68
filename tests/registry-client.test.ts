import { afterEach, expect, test } from "vitest"

import {
  extractServiceNames,
  HttpRegistryClient,
  RegistryUnreachableError,
} from "../src/lib/registry-client"

import { freePort, startHttpStub, type HttpStub } from "./helpers/http-stub"

const stubs: Array<HttpStub> = []

afterEach(async () => {
  await Promise.all(stubs.splice(0).map((stub) => stub.close()))
})

test("extracts ids and service names from an agent listing", () => {
  const body = JSON.stringify({
    "auth_service-8202": { ID: "auth_service-8202", Service: "auth_service", Port: 8202 },
    "consul": { ID: "consul", Service: "consul" },
  })

  expect(extractServiceNames(body)).toEqual(["auth_service-8202", "auth_service", "consul"])
})

test("accepts a plain array of names", () => {
  expect(extractServiceNames("[\"a\", 1, \"b\"]")).toEqual(["a", "b"])
})

test("falls back to raw text for non-JSON bodies", () => {
  expect(extractServiceNames("auth_service order_service")).toEqual(["auth_service order_service"])
  expect(extractServiceNames("  ")).toEqual([])
})

test("lists services from the registry endpoint", async () => {
  const stub = await startHttpStub((_req, res) => {
    res.writeHead(200, { "Content-Type": "application/json" })
    res.end(JSON.stringify({ "svcA-1": { ID: "svcA-1", Service: "svcA" } }))
  })
  stubs.push(stub)
  const client = new HttpRegistryClient(`${stub.url}/v1/agent/services`)

  expect(await client.listServices(1000)).toEqual(["svcA-1", "svcA"])
  expect(stub.requests).toEqual(["GET /v1/agent/services"])
})

test("error status counts as unreachable", async () => {
  const stub = await startHttpStub((_req, res) => {
    res.writeHead(500)
    res.end()
  })
  stubs.push(stub)
  const client = new HttpRegistryClient(`${stub.url}/v1/agent/services`)

  await expect(client.listServices(1000)).rejects.toBeInstanceOf(RegistryUnreachableError)
})

test("refused connection is unreachable", async () => {
  const url = `http://127.0.0.1:${await freePort()}/v1/agent/services`
  const client = new HttpRegistryClient(url)

  await expect(client.listServices(1000)).rejects.toThrow(
    `Cannot connect to service registry at ${url}`,
  )
})
