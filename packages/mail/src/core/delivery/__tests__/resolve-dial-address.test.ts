import { formatDialAddress, resolveDialAddress, tlsUpgradeFor } from "../resolve-dial-address"

describe("resolveDialAddress", () => {
  it.each([
    ["mail.example.com", 25, { host: "mail.example.com", port: 25 }],
    ["mail.example.com:2525", 25, { host: "mail.example.com", port: 2525 }],
    ["127.0.0.1:1025", 587, { host: "127.0.0.1", port: 1025 }],
    ["[::1]:2525", 25, { host: "::1", port: 2525 }],
    ["::1", 587, { host: "::1", port: 587 }],
    ["[::1]", 587, { host: "::1", port: 587 }],
  ])("%s with port %s", (server, port, expected) => {
    expect(resolveDialAddress(server, port)).toEqual(expected)
  })
})

describe("formatDialAddress", () => {
  it("brackets IPv6 hosts", () => {
    expect(formatDialAddress({ host: "::1", port: 25 })).toBe("[::1]:25")
    expect(formatDialAddress({ host: "mail.example.com", port: 25 })).toBe("mail.example.com:25")
  })
})

describe("tlsUpgradeFor", () => {
  it("names the host for SNI", () => {
    expect(tlsUpgradeFor("mail.example.com")).toEqual({ servername: "mail.example.com" })
  })

  it.each(["127.0.0.1", "::1"])("leaves the server name out for %s", (host) => {
    expect(tlsUpgradeFor(host)).toEqual({})
  })
})
