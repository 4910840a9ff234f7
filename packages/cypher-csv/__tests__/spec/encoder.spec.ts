/**
 * Encoder Specification Tests
 *
 * Graph to table pair: header synthesis, row rendering and encode errors.
 */

import { describe, it, expect, beforeEach } from "vitest"
import { encodeGraph } from "../../src/encoder"
import {
  DirectedGraph,
  type EdgeRecord,
  type GraphReader,
  type PropertyValue,
  type VertexRecord,
} from "../../src/graph"
import { MalformedHeaderError, UnsupportedTypeError } from "../../src/errors"

describe("Encoder Specification", () => {
  let graph: DirectedGraph

  beforeEach(() => {
    graph = new DirectedGraph()
  })

  // ===========================================================================
  // BASIC TABLES
  // ===========================================================================

  describe("Basic Tables", () => {
    it("encodes vertices and edges with typed headers", () => {
      graph.addVertex(1, { name: "Alice", age: 30 })
      graph.addVertex(2, { name: "Bob" })
      graph.addEdge(1, 2, { since: 2020 })

      expect(encodeGraph(graph)).toEqual({
        vertices: ":ID,name:string,age:int\n1,Alice,30\n2,Bob,\n",
        edges: ":START_ID,:END_ID,since:int\n1,2,2020\n",
      })
    })

    it("encodes an empty graph as two header-only tables", () => {
      expect(encodeGraph(graph)).toEqual({
        vertices: ":ID\n",
        edges: ":START_ID,:END_ID\n",
      })
    })

    it("writes vertices created only by edges as bare rows", () => {
      graph.addEdge("a", "b", {})

      expect(encodeGraph(graph)).toEqual({
        vertices: ":ID\na\nb\n",
        edges: ":START_ID,:END_ID\na,b\n",
      })
    })

    it("keeps parallel edges as separate rows", () => {
      graph.addEdge("a", "b", { weight: 1 })
      graph.addEdge("a", "b", { weight: 2 })

      expect(encodeGraph(graph).edges).toBe(":START_ID,:END_ID,weight:int\na,b,1\na,b,2\n")
    })

    it("does not modify the graph", () => {
      graph.addVertex("a", { score: 1.5 }, ["Player"])
      graph.addEdge("a", "b", {}, "FOLLOWS")

      encodeGraph(graph)

      expect(graph.stats()).toEqual({ vertices: 2, edges: 1 })
      expect(graph.getVertex("a")).toEqual({ id: "a", properties: { score: 1.5 }, labels: ["Player"] })
      expect(graph.getVertex("b")).toEqual({ id: "b", properties: {} })
    })
  })

  // ===========================================================================
  // COLUMN TYPES
  // ===========================================================================

  describe("Column Types", () => {
    it("widens a column holding ints and floats to float", () => {
      graph.addVertex("a", { age: 5 })
      graph.addVertex("b", { age: 5.5 })

      expect(encodeGraph(graph).vertices).toBe(":ID,age:float\na,5.0\nb,5.5\n")
    })

    it("widens a column holding unrelated kinds to string", () => {
      graph.addVertex("a", { code: 7 })
      graph.addVertex("b", { code: "x7" })
      graph.addVertex("c", { code: true })

      expect(encodeGraph(graph).vertices).toBe(":ID,code:string\na,7\nb,x7\nc,true\n")
    })

    it("encodes array properties with the array delimiter", () => {
      graph.addVertex("a", { tags: ["red", "blue"], scores: [1.5, 2] })
      graph.addVertex("b", { tags: [], scores: [3] })

      expect(encodeGraph(graph).vertices).toBe(
        ":ID,tags:string[],scores:float[]\na,red;blue,1.5;2.0\nb,,3.0\n",
      )
    })

    it("types a column of only empty arrays as string[]", () => {
      graph.addVertex("a", { tags: [] })

      expect(encodeGraph(graph).vertices).toBe(":ID,tags:string[]\na,\n")
    })

    it("encodes bigints as int", () => {
      graph.addVertex("a", { big: 12345678901234567890n })

      expect(encodeGraph(graph).vertices).toBe(":ID,big:int\na,12345678901234567890\n")
    })

    it("leaves cells empty for keys named like Object.prototype members", () => {
      graph.addVertex("a", { toString: "x", constructor: 1, valueOf: true })
      graph.addVertex("b", { name: "Bob" })

      expect(encodeGraph(graph).vertices).toBe(
        ":ID,toString:string,constructor:int,valueOf:boolean,name:string\na,x,1,true,\nb,,,,Bob\n",
      )
    })

    it("creates no column for keys that are always absent", () => {
      graph.addVertex("a", { name: "Ann", nickname: null })
      graph.addVertex("b", { nickname: undefined })

      expect(encodeGraph(graph).vertices).toBe(":ID,name:string\na,Ann\nb,\n")
    })

    it("types vertex and edge columns independently", () => {
      graph.addVertex("a", { weight: "heavy" })
      graph.addEdge("a", "b", { weight: 2 })

      const { vertices, edges } = encodeGraph(graph)

      expect(vertices).toBe(":ID,weight:string\na,heavy\nb,\n")
      expect(edges).toBe(":START_ID,:END_ID,weight:int\na,b,2\n")
    })
  })

  // ===========================================================================
  // COLUMN ORDER
  // ===========================================================================

  describe("Column Order", () => {
    it("orders property columns by first appearance", () => {
      graph.addVertex("a", { zeta: 1 })
      graph.addVertex("b", { alpha: "x", zeta: 2 })

      expect(encodeGraph(graph).vertices).toBe(":ID,zeta:int,alpha:string\na,1,\nb,2,x\n")
    })

    it("orders property columns by name when sorted", () => {
      graph.addVertex("a", { zeta: 1 })
      graph.addVertex("b", { alpha: "x", zeta: 2 })

      expect(encodeGraph(graph, { columnOrder: "sorted" }).vertices).toBe(
        ":ID,alpha:string,zeta:int\na,,1\nb,x,2\n",
      )
    })
  })

  // ===========================================================================
  // LABELS AND TYPES
  // ===========================================================================

  describe("Labels And Types", () => {
    it("writes labels joined with the array delimiter", () => {
      graph.addVertex("p", { name: "Pat" }, ["Person", "Employee"])
      graph.addVertex("q", { name: "Quinn" })

      expect(encodeGraph(graph).vertices).toBe(
        ":ID,name:string,:LABEL:string[]\np,Pat,Person;Employee\nq,Quinn,\n",
      )
    })

    it("writes relationship types after the endpoints", () => {
      graph.addEdge("a", "b", { since: 2019 }, "KNOWS")
      graph.addEdge("b", "c", {})

      expect(encodeGraph(graph).edges).toBe(":START_ID,:END_ID,:TYPE,since:int\na,b,KNOWS,2019\nb,c,,\n")
    })

    it("fills in default labels and types", () => {
      graph.addVertex("river", {})
      graph.addVertex("lake", {}, ["Water"])
      graph.addEdge("river", "lake", { flow: "in" })

      expect(encodeGraph(graph, { defaultVertexLabel: "Place", defaultEdgeType: "FEEDS" })).toEqual({
        vertices: ":ID,:LABEL:string[]\nriver,Place\nlake,Water\n",
        edges: ":START_ID,:END_ID,:TYPE,flow:string\nriver,lake,FEEDS,in\n",
      })
    })

    it("uses the configured array delimiter for arrays and labels", () => {
      graph.addVertex("a", { tags: ["x", "y"] }, ["One", "Two"])

      expect(encodeGraph(graph, { arrayDelimiter: "|" }).vertices).toBe(
        ":ID,tags:string[],:LABEL:string[]\na,x|y,One|Two\n",
      )
    })
  })

  // ===========================================================================
  // QUOTING
  // ===========================================================================

  describe("Quoting", () => {
    it("quotes cells containing commas, quotes and line breaks", () => {
      graph.addVertex("a", { name: 'Smith, "Jr"' })
      graph.addVertex("b", { name: "line one\nline two" })

      expect(encodeGraph(graph).vertices).toBe(
        ':ID,name:string\na,"Smith, ""Jr"""\nb,"line one\nline two"\n',
      )
    })

    it("quotes identifiers containing commas", () => {
      graph.addEdge("x,1", "y", {})

      expect(encodeGraph(graph).edges).toBe(':START_ID,:END_ID\n"x,1",y\n')
    })
  })

  // ===========================================================================
  // ERRORS
  // ===========================================================================

  describe("Errors", () => {
    it("rejects mixed-type arrays", () => {
      graph.addVertex("a", { mix: [1, "a"] })

      expect(() => encodeGraph(graph)).toThrow(UnsupportedTypeError)
    })

    it("rejects non-finite numbers", () => {
      graph.addEdge("a", "b", { weight: Number.NaN })

      expect(() => encodeGraph(graph)).toThrow(
        "Unsupported value for property 'weight': non-finite number NaN values have no type tag",
      )
    })

    it("rejects array elements containing the delimiter", () => {
      graph.addVertex("a", { tags: ["x;y"] })

      expect(() => encodeGraph(graph)).toThrow(UnsupportedTypeError)
      expect(() => encodeGraph(graph, { arrayDelimiter: "|" })).not.toThrow()
    })

    it("rejects property keys that cannot be columns", () => {
      const empty = new DirectedGraph()
      empty.addVertex("a", { "": 1 })
      const structural = new DirectedGraph()
      structural.addEdge("a", "b", { ":TYPE": "x" })

      expect(() => encodeGraph(empty)).toThrow(MalformedHeaderError)
      expect(() => encodeGraph(structural)).toThrow(
        "Malformed edge header: property key ':TYPE' collides with a structural column",
      )
    })

    it("rejects the __proto__ property key", () => {
      const properties: Record<string, PropertyValue> = { name: "x" }
      Object.defineProperty(properties, "__proto__", { value: 5, enumerable: true })
      graph.addVertex("a", properties)

      expect(() => encodeGraph(graph)).toThrow(
        "Malformed vertex header: property key '__proto__' is reserved",
      )
    })

    it("quotes a table whose key holds a carriage return", () => {
      graph.addVertex("a", { "k\rx": "v" })
      graph.addVertex("b", {})

      expect(encodeGraph(graph).vertices).toBe('":ID","k\rx:string"\n"a","v"\n"b",\n')
    })

    it("rejects empty identifiers", () => {
      graph.addVertex("", { name: "nobody" })

      expect(() => encodeGraph(graph)).toThrow(
        "Unsupported value for property ':ID': identifiers must not be empty",
      )
    })

    it("rejects labels containing the delimiter", () => {
      graph.addVertex("a", {}, ["A;B"])

      expect(() => encodeGraph(graph)).toThrow(UnsupportedTypeError)
    })
  })

  // ===========================================================================
  // CUSTOM GRAPHS
  // ===========================================================================

  describe("Custom Graphs", () => {
    it("encodes any graph reader", () => {
      const vertexRecords: VertexRecord[] = [
        { id: 10, properties: { ok: true }, labels: ["Check"] },
        { id: 11, properties: { ok: false } },
      ]
      const edgeRecords: EdgeRecord[] = [{ source: 10, target: 11, properties: {}, type: "NEXT" }]
      const reader: GraphReader = {
        vertices: () => vertexRecords,
        edges: () => edgeRecords,
      }

      expect(encodeGraph(reader)).toEqual({
        vertices: ":ID,ok:boolean,:LABEL:string[]\n10,true,Check\n11,false,\n",
        edges: ":START_ID,:END_ID,:TYPE\n10,11,NEXT\n",
      })
    })
  })
})
