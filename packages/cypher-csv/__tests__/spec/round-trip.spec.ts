/**
 * Round-Trip Specification Tests
 *
 * Decoding an encoded graph restores it, with identifiers as strings.
 */

import { describe, it, expect } from "vitest"
import { decodeGraph } from "../../src/decoder"
import { encodeGraph } from "../../src/encoder"
import { DirectedGraph } from "../../src/graph"

function buildGraph(): DirectedGraph {
  const graph = new DirectedGraph()
  graph.addVertex(
    "alice",
    {
      name: 'Alice, "Al"',
      age: 30,
      height: 1.7,
      active: true,
      tags: ["climbing", "chess"],
      scores: [1.5, 2],
    },
    ["Person", "Employee"],
  )
  graph.addVertex("bob", { name: "Bob\nSmith", age: 41, height: 2, active: false })
  graph.addVertex(7, {})
  graph.addVertex("counter", { total: 2n ** 64n }, ["Metric"])

  graph.addEdge("alice", "bob", { since: 2019, weight: 0.75 }, "KNOWS")
  graph.addEdge("bob", "alice", {})
  graph.addEdge("alice", 7, { since: 2021 }, "OWNS")
  graph.addEdge("alice", "bob", { since: 2020 }, "KNOWS")
  return graph
}

describe("Round-Trip Specification", () => {
  it("restores vertices with their properties and labels", () => {
    const original = buildGraph()
    const { vertices, edges } = encodeGraph(original)
    const decoded = decodeGraph(vertices, edges)

    expect(decoded.stats()).toEqual(original.stats())
    for (const vertex of original.vertices()) {
      expect(decoded.getVertex(String(vertex.id))).toEqual({ ...vertex, id: String(vertex.id) })
    }
  })

  it("restores edges in order, parallel edges included", () => {
    const original = buildGraph()
    const { vertices, edges } = encodeGraph(original)
    const decoded = decodeGraph(vertices, edges)

    const expected = [...original.edges()].map((edge) => ({
      ...edge,
      source: String(edge.source),
      target: String(edge.target),
    }))
    expect([...decoded.edges()]).toEqual(expected)
  })

  it("round-trips arrays under a custom delimiter", () => {
    const original = new DirectedGraph()
    original.addVertex("doc", { parts: ["a;b", "c"] }, ["File"])

    const { vertices, edges } = encodeGraph(original, { arrayDelimiter: "|" })
    const decoded = decodeGraph(vertices, edges, { arrayDelimiter: "|" })

    expect(decoded.getVertex("doc")).toEqual({ id: "doc", properties: { parts: ["a;b", "c"] }, labels: ["File"] })
  })

  it("round-trips keys and values containing carriage returns", () => {
    const original = new DirectedGraph()
    original.addVertex("a", { "k\rx": "v", note: "one\rtwo" })
    original.addVertex("b", { "k\rx": "w" })
    original.addEdge("a", "b", { "why\r": "cr" })

    const { vertices, edges } = encodeGraph(original)
    const decoded = decodeGraph(vertices, edges)

    expect(decoded.getVertex("a")).toEqual({ id: "a", properties: { "k\rx": "v", note: "one\rtwo" } })
    expect(decoded.getVertex("b")).toEqual({ id: "b", properties: { "k\rx": "w" } })
    expect([...decoded.edges()]).toEqual([{ source: "a", target: "b", properties: { "why\r": "cr" } }])
  })

  it("round-trips keys named like Object.prototype members", () => {
    const original = new DirectedGraph()
    original.addVertex("a", { toString: "x", constructor: 1, valueOf: true })
    original.addVertex("b", { name: "Bob" })

    const { vertices, edges } = encodeGraph(original)
    const decoded = decodeGraph(vertices, edges)

    expect(decoded.getVertex("a")?.properties).toEqual({ toString: "x", constructor: 1, valueOf: true })
    expect(decoded.getVertex("b")?.properties).toEqual({ name: "Bob" })
  })

  it("re-encodes a decoded table pair to the same text", () => {
    const vertices =
      ":ID,name:string,score:float,tags:string[],:LABEL:string[]\na,Ann,0.5,x;y,Person\nb,Ben,1.25,,\n"
    const edges = ":START_ID,:END_ID,:TYPE,since:int\na,b,KNOWS,2020\n"

    expect(encodeGraph(decodeGraph(vertices, edges))).toEqual({ vertices, edges })
  })
})
