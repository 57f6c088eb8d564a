import { describe, it, expect, beforeAll } from "vitest";
import { FakeAdapter, CHINOOK } from "./helpers/fakeAdapter";
import { Schema } from "../src/schema/schema";
import { postgresDialect } from "../src/query/dialect";
import { add, div, eq, gt, sum } from "../src/query/expr";
import {
  InvalidExpressionError,
  InvalidOperationError,
  UnknownColumnError,
  UnsupportedJoinKindError,
} from "../src/errors";

const ALL_TRACKS = "SELECT a.TrackId, a.Name, a.AlbumId, a.Milliseconds, a.Bytes, a.UnitPrice FROM tracks AS a;";

let adapter: FakeAdapter;
let schema: Schema;

beforeAll(async () => {
  adapter = new FakeAdapter();
  schema = await Schema.load(adapter);
});

describe("single-table frames", () => {
  it("reads every column of a fresh frame", () => {
    expect(schema.frame("tracks").query()).toBe(ALL_TRACKS);
  });

  it("filters and projects", () => {
    const t = schema.frame("tracks");
    const q = t.select(["UnitPrice"]).where(gt(t.col("Milliseconds"), 393599));
    expect(q.query()).toBe("SELECT a.UnitPrice FROM tracks AS a WHERE a.Milliseconds > 393599;");
  });

  it("conjoins successive filters in order", () => {
    const t = schema.frame("tracks");
    const q = t.where(gt(t.col("Milliseconds"), 1000)).where(eq(t.col("AlbumId"), 1)).select(["Name"]);
    expect(q.query()).toBe("SELECT a.Name FROM tracks AS a WHERE (a.Milliseconds > 1000) AND (a.AlbumId = 1);");
  });

  it("appends computed columns", () => {
    const t = schema.frame("tracks");
    const q = t.assign("Size", add(t.col("Milliseconds"), t.col("Bytes"))).select(["Size"]);
    expect(q.query()).toBe("SELECT a.Milliseconds + a.Bytes AS Size FROM tracks AS a;");
  });

  it("replaces an existing column in place", () => {
    const t = schema.frame("tracks").select(["Name", "Bytes"]);
    const q = t.assign("Bytes", div(t.col("Bytes"), 1024));
    expect(q.columns).toEqual(["Name", "Bytes"]);
    expect(q.query()).toBe("SELECT a.Name, a.Bytes / 1024 AS Bytes FROM tracks AS a;");
  });

  it("renames without touching the expression", () => {
    const q = schema.frame("tracks").select(["TrackId", "Name"]).rename({ Name: "Track" });
    expect(q.columns).toEqual(["TrackId", "Track"]);
    expect(q.query()).toBe("SELECT a.TrackId, a.Name AS Track FROM tracks AS a;");
    expect(q.col("Track")).toEqual(schema.frame("tracks").col("Name"));
  });

  it("drops columns", () => {
    expect(schema.frame("tracks").drop(["Bytes", "UnitPrice"]).columns).toEqual([
      "TrackId",
      "Name",
      "AlbumId",
      "Milliseconds",
    ]);
  });

  it("escapes string literals", () => {
    const t = schema.frame("tracks");
    expect(t.where(eq(t.col("Name"), "Rock 'n' Roll")).select(["TrackId"]).query()).toBe(
      "SELECT a.TrackId FROM tracks AS a WHERE a.Name = 'Rock ''n'' Roll';",
    );
  });

  it("never changes the frame it derives from", () => {
    const t = schema.frame("tracks");
    const derived = t.select(["Name"]).where(gt(t.col("Milliseconds"), 1));
    expect(t.query()).toBe(ALL_TRACKS);
    expect(t.columns).toHaveLength(6);
    expect(derived.plan.source).toBe(t.plan.source);
  });

  it("renders the same text every time", () => {
    const t = schema.frame("tracks");
    const q = t.where(gt(t.col("Milliseconds"), 1));
    expect(q.query()).toBe(q.query());
  });
});

describe("rejected operations", () => {
  it("unknown columns", () => {
    const t = schema.frame("tracks");
    expect(() => t.col("Nope")).toThrow(UnknownColumnError);
    expect(() => t.select(["Name", "Nope"])).toThrow(UnknownColumnError);
    expect(() => t.drop(["Nope"])).toThrow(UnknownColumnError);
    expect(() => t.rename({ Nope: "x" })).toThrow(UnknownColumnError);
  });

  it("empty, duplicate and exhaustive selections", () => {
    const t = schema.frame("artists");
    expect(() => t.select([])).toThrow(InvalidOperationError);
    expect(() => t.select(["Name", "Name"])).toThrow(InvalidOperationError);
    expect(() => t.rename({ Name: "ArtistId" })).toThrow(InvalidOperationError);
    expect(() => t.drop(["ArtistId", "Name"])).toThrow("cannot drop every column");
  });

  it("predicates over relations the frame does not read", () => {
    const t = schema.frame("tracks");
    const albums = schema.frame("albums");
    expect(() => t.where(eq(albums.col("AlbumId"), 1))).toThrow(InvalidExpressionError);
  });

  it("aggregates outside of materialization", () => {
    const t = schema.frame("tracks");
    expect(() => t.assign("Total", sum(t.col("Bytes")))).toThrow(InvalidExpressionError);
    expect(() => t.where(gt(sum(t.col("Bytes")), 1))).toThrow(InvalidExpressionError);
  });

  it("invalid slices", () => {
    const t = schema.frame("tracks");
    expect(() => t.slice(-1)).toThrow(InvalidOperationError);
    expect(() => t.slice(3, 2)).toThrow(InvalidOperationError);
    expect(() => t.slice(0.5)).toThrow(InvalidOperationError);
  });

  it("never touch the database", () => {
    expect(adapter.executed).toEqual([]);
  });
});

describe("distinct and slicing", () => {
  it("deduplicates", () => {
    expect(schema.frame("tracks").select(["AlbumId"]).dropDuplicates().query()).toBe(
      "SELECT DISTINCT a.AlbumId FROM tracks AS a;",
    );
  });

  it("slices with limit and offset", () => {
    const t = schema.frame("tracks").select(["Name"]);
    expect(t.slice(2, 3).query()).toBe("SELECT a.Name FROM tracks AS a LIMIT 1 OFFSET 2;");
    expect(t.slice(0, 10).query()).toBe("SELECT a.Name FROM tracks AS a LIMIT 10;");
    expect(t.slice(5).query()).toBe("SELECT a.Name FROM tracks AS a LIMIT -1 OFFSET 5;");
    expect(t.slice().query()).toBe("SELECT a.Name FROM tracks AS a;");
  });

  it("limits a deduplicated frame in the same statement", () => {
    expect(schema.frame("tracks").select(["AlbumId"]).dropDuplicates().slice(0, 3).query()).toBe(
      "SELECT DISTINCT a.AlbumId FROM tracks AS a LIMIT 3;",
    );
  });

  it("wraps a limited frame before deduplicating", () => {
    expect(schema.frame("tracks").select(["AlbumId"]).slice(0, 3).dropDuplicates().query()).toBe(
      "SELECT DISTINCT a.AlbumId FROM (SELECT b.AlbumId FROM tracks AS b LIMIT 3) AS a;",
    );
  });

  it("filters a limited frame from the outside", () => {
    const s = schema.frame("tracks").select(["Name", "AlbumId"]).slice(0, 10);
    expect(s.where(eq(s.col("AlbumId"), 1)).query()).toBe(
      "SELECT a.Name, a.AlbumId FROM (SELECT b.Name, b.AlbumId FROM tracks AS b LIMIT 10) AS a WHERE a.AlbumId = 1;",
    );
  });

  it("rejects references into a limited frame's inner table", () => {
    const t = schema.frame("tracks");
    const s = t.slice(0, 10);
    expect(() => s.where(eq(t.col("AlbumId"), 1))).toThrow(InvalidExpressionError);
  });
});

describe("merge", () => {
  it("joins on a shared column", () => {
    const q = schema.frame("tracks").merge(schema.frame("albums"), { on: "AlbumId" }).select(["Name", "Title"]);
    expect(q.query()).toBe("SELECT a.Name, b.Title FROM tracks AS a INNER JOIN albums AS b ON a.AlbumId=b.AlbumId;");
  });

  it("infers the key from the only shared column", () => {
    const q = schema.frame("tracks").merge(schema.frame("albums"));
    expect(q.query()).toBe(
      "SELECT a.TrackId, a.Name, a.AlbumId, a.Milliseconds, a.Bytes, a.UnitPrice, b.Title, b.ArtistId " +
        "FROM tracks AS a INNER JOIN albums AS b ON a.AlbumId=b.AlbumId;",
    );
  });

  it("keeps the left column when both sides share a name", () => {
    const q = schema
      .frame("tracks")
      .merge(schema.frame("albums"), { on: "AlbumId" })
      .merge(schema.frame("artists"), { on: "ArtistId" });
    expect(q.columns).toEqual(["TrackId", "Name", "AlbumId", "Milliseconds", "Bytes", "UnitPrice", "Title", "ArtistId"]);
    expect(q.select(["Name", "Title"]).query()).toBe(
      "SELECT a.Name, b.Title FROM tracks AS a INNER JOIN albums AS b ON a.AlbumId=b.AlbumId " +
        "INNER JOIN artists AS c ON b.ArtistId=c.ArtistId;",
    );
  });

  it("keeps both columns after a rename", () => {
    const q = schema
      .frame("tracks")
      .merge(schema.frame("albums"), { on: "AlbumId" })
      .merge(schema.frame("artists").rename({ Name: "Artist" }), { on: "ArtistId" })
      .select(["Name", "Title", "Artist"]);
    expect(q.query()).toBe(
      "SELECT a.Name, b.Title, c.Name AS Artist FROM tracks AS a INNER JOIN albums AS b ON a.AlbumId=b.AlbumId " +
        "INNER JOIN artists AS c ON b.ArtistId=c.ArtistId;",
    );
  });

  it("parenthesizes a joined right side", () => {
    const albums = schema.frame("albums").merge(schema.frame("artists"), { on: "ArtistId" });
    const q = schema.frame("tracks").merge(albums, { on: "AlbumId" }).select(["Name", "Title"]);
    expect(q.query()).toBe(
      "SELECT a.Name, b.Title FROM tracks AS a INNER JOIN " +
        "(albums AS b INNER JOIN artists AS c ON b.ArtistId=c.ArtistId) ON a.AlbumId=b.AlbumId;",
    );
  });

  it("gives each side of a self-join its own alias", () => {
    const q = schema
      .frame("tracks")
      .merge(schema.frame("tracks"), { leftOn: "AlbumId", rightOn: "TrackId" })
      .select(["Name"]);
    expect(q.query()).toBe("SELECT a.Name FROM tracks AS a INNER JOIN tracks AS b ON a.AlbumId=b.TrackId;");

    const other = schema.frame("tracks").select(["TrackId", "Name"]).rename({ TrackId: "OtherId", Name: "OtherName" });
    const both = schema
      .frame("tracks")
      .merge(other, { leftOn: "AlbumId", rightOn: "OtherId" })
      .select(["Name", "OtherName"]);
    expect(both.query()).toBe(
      "SELECT a.Name, b.Name AS OtherName FROM tracks AS a INNER JOIN tracks AS b ON a.AlbumId=b.TrackId;",
    );
  });

  it("resolves right-side references of a self-join through the merged frame", () => {
    const other = schema.frame("tracks").rename({ Name: "OtherName" });
    const merged = schema.frame("tracks").merge(other, { leftOn: "AlbumId", rightOn: "TrackId" });
    expect(merged.where(eq(merged.col("OtherName"), "x")).select(["Name"]).query()).toBe(
      "SELECT a.Name FROM tracks AS a INNER JOIN tracks AS b ON a.AlbumId=b.TrackId WHERE b.Name = 'x';",
    );
  });

  it("moves the right filter of a left join into its condition", () => {
    const t = schema.frame("tracks");
    const q = schema
      .frame("albums")
      .merge(t.where(gt(t.col("Milliseconds"), 300000)), { on: "AlbumId", how: "left" })
      .select(["Title", "Name"]);
    expect(q.query()).toBe(
      "SELECT a.Title, b.Name FROM albums AS a LEFT JOIN tracks AS b ON a.AlbumId=b.AlbumId AND (b.Milliseconds > 300000);",
    );
  });

  it("conjoins both filters of an inner join, left first", () => {
    const t = schema.frame("tracks");
    const albums = schema.frame("albums");
    const q = albums
      .where(eq(albums.col("ArtistId"), 1))
      .merge(t.where(gt(t.col("Milliseconds"), 300000)), { on: "AlbumId" })
      .select(["Title", "Name"]);
    expect(q.query()).toBe(
      "SELECT a.Title, b.Name FROM albums AS a INNER JOIN tracks AS b ON a.AlbumId=b.AlbumId " +
        "WHERE (a.ArtistId = 1) AND (b.Milliseconds > 300000);",
    );
  });

  it("rejects unusable keys and join kinds", () => {
    const t = schema.frame("tracks");
    const albums = schema.frame("albums");
    expect(() => t.merge(albums, { on: "AlbumId", how: "outer" })).toThrow(UnsupportedJoinKindError);
    expect(() => t.merge(albums, { on: "Title" })).toThrow(UnknownColumnError);
    expect(() => t.merge(albums, { leftOn: "AlbumId" })).toThrow(InvalidOperationError);
    expect(() => t.merge(albums, { leftOn: ["AlbumId"], rightOn: ["AlbumId", "Title"] })).toThrow(InvalidOperationError);
    expect(() => t.select(["TrackId"]).merge(schema.frame("artists"))).toThrow("frames share no column to merge on");
  });

  it("rejects empty key lists", () => {
    const t = schema.frame("tracks");
    const albums = schema.frame("albums");
    expect(() => t.merge(albums, { on: [] })).toThrow("merge needs at least one key column");
    expect(() => t.merge(albums, { leftOn: [], rightOn: [] })).toThrow(InvalidOperationError);
  });

  it("rejects frames from another connection", async () => {
    const other = await Schema.load(new FakeAdapter());
    expect(() => schema.frame("tracks").merge(other.frame("albums"))).toThrow(InvalidOperationError);
  });
});

describe("keyword columns", () => {
  it("are quoted wherever they appear", async () => {
    const orders = await Schema.load(
      new FakeAdapter({
        orders: [
          { name: "order", type: "INTEGER" },
          { name: "group", type: "TEXT" },
        ],
      }),
    );
    expect(orders.frame("orders").rename({ group: "select" }).query()).toBe(
      'SELECT a."order", a."group" AS "select" FROM orders AS a;',
    );
  });
});

describe("postgres dialect", () => {
  it("quotes mixed-case columns and keeps schema-qualified tables", async () => {
    const pg = await Schema.load(new FakeAdapter({ "public.tracks": CHINOOK.tracks }, undefined, postgresDialect));
    expect(pg.frame("public.tracks").select(["TrackId", "Name"]).query()).toBe(
      'SELECT a."TrackId", a."Name" FROM public.tracks AS a;',
    );
  });
});
