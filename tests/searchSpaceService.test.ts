import { beforeEach, describe, expect, it, vi } from "vitest";
import { NotFoundError, ValidationError } from "../src/domain/errors.js";
import { InMemoryContentStore } from "../src/infra/store/inMemoryContentStore.js";
import { HybridRetriever } from "../src/services/hybridRetriever.js";
import { SearchSpaceService } from "../src/services/searchSpaceService.js";
import { StubEmbeddingProvider } from "./support/stubs.js";

describe("SearchSpaceService", () => {
  let store: InMemoryContentStore;
  let service: SearchSpaceService;

  beforeEach(() => {
    const provider = new StubEmbeddingProvider();
    store = new InMemoryContentStore(provider, { dimension: 3, documentEmbeddingMaxChars: 500 });
    service = new SearchSpaceService({
      contentStore: store,
      chunkRetriever: new HybridRetriever(store.chunks, provider),
      documentRetriever: new HybridRetriever(store.documents, provider),
      chunking: { maxChars: 200, overlap: 20 },
    });
  });

  it("validates search space names and descriptions", async () => {
    await expect(service.createSearchSpace("owner-1", { name: "  " })).rejects.toThrow(
      "Search space name must be between 1 and 100 characters.",
    );
    await expect(
      service.createSearchSpace("owner-1", { name: "Notes", description: "d".repeat(501) }),
    ).rejects.toBeInstanceOf(ValidationError);

    const space = await service.createSearchSpace("owner-1", { name: " Notes " });
    expect(space).toMatchObject({ name: "Notes", description: null, ownerId: "owner-1" });
  });

  it("chunks added text along its sections", async () => {
    const space = await service.createSearchSpace("owner-1", { name: "Notes" });

    const document = await service.addTextDocument("owner-1", space.id, {
      title: "Orchard",
      content: "# Apples\nPick in autumn.\n\n# Cherries\nPick in summer.",
    });

    expect(document).toMatchObject({ title: "Orchard", documentType: "FILE", metadata: {} });
    const chunks = await store.listChunks(document.id);
    expect(chunks.map((chunk) => chunk.content)).toEqual([
      "[Apples]\nPick in autumn.",
      "[Cherries]\nPick in summer.",
    ]);
  });

  it("keeps documents inside their owner's spaces", async () => {
    const mine = await service.createSearchSpace("owner-1", { name: "Mine" });
    const theirs = await service.createSearchSpace("owner-2", { name: "Theirs" });

    await expect(
      service.addTextDocument("owner-1", theirs.id, { title: "x", content: "apple" }),
    ).rejects.toBeInstanceOf(NotFoundError);

    const document = await service.addTextDocument("owner-2", theirs.id, {
      title: "Theirs",
      content: "apple",
    });
    await expect(service.deleteDocument("owner-1", document.id)).rejects.toBeInstanceOf(
      NotFoundError,
    );
    await expect(service.deleteSearchSpace("owner-1", theirs.id)).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(await service.listDocuments("owner-1")).toEqual([]);
    expect(await service.listDocuments("owner-1", [mine.id, theirs.id])).toEqual([]);
  });

  it("searches only the owner's requested spaces", async () => {
    const kitchen = await service.createSearchSpace("owner-1", { name: "Kitchen" });
    const garden = await service.createSearchSpace("owner-1", { name: "Garden" });
    const foreign = await service.createSearchSpace("owner-2", { name: "Foreign" });
    await service.addTextDocument("owner-1", kitchen.id, { title: "Pie", content: "apple pie" });
    await service.addTextDocument("owner-1", garden.id, { title: "Tree", content: "apple tree" });
    await service.addTextDocument("owner-2", foreign.id, {
      title: "Other",
      content: "apple juice",
    });

    const all = await service.searchChunks("owner-1", "apple", 10);
    expect(all.map((hit) => hit.entity.content).sort()).toEqual(["apple pie", "apple tree"]);

    const gardenOnly = await service.searchDocuments("owner-1", "apple", 10, [garden.id]);
    expect(gardenOnly.map((hit) => hit.entity.title)).toEqual(["Tree"]);

    expect(await service.searchChunks("owner-1", "apple", 10, [foreign.id])).toEqual([]);
  });

  it("deletes documents and spaces for their owner", async () => {
    const space = await service.createSearchSpace("owner-1", { name: "Notes" });
    const document = await service.addTextDocument("owner-1", space.id, {
      title: "Pie",
      content: "apple pie",
    });

    expect(await service.deleteDocument("owner-1", document.id)).toEqual({
      deleted: true,
      id: document.id,
    });
    expect(await service.listDocuments("owner-1")).toEqual([]);

    expect(await service.deleteSearchSpace("owner-1", space.id)).toEqual({
      deleted: true,
      id: space.id,
    });
    expect(await service.listSearchSpaces("owner-1")).toEqual([]);
  });
  it("reads a document with its chunks for its owner only", async () => {
    const space = await service.createSearchSpace("owner-1", { name: "Notes" });
    const added = await service.addTextDocument("owner-1", space.id, {
      title: "Orchard",
      content: "# Apples\nPick in autumn.\n\n# Cherries\nPick in summer.",
    });

    const { document, chunks } = await service.getDocument("owner-1", added.id);

    expect(document.content).toBe("# Apples\nPick in autumn.\n\n# Cherries\nPick in summer.");
    expect(chunks.map((chunk) => [chunk.index, chunk.content])).toEqual([
      [0, "[Apples]\nPick in autumn."],
      [1, "[Cherries]\nPick in summer."],
    ]);
    await expect(service.getDocument("owner-2", added.id)).rejects.toThrow(
      `Document ${added.id} not found.`,
    );
  });

  it("re-indexes a document when its content changes", async () => {
    const space = await service.createSearchSpace("owner-1", { name: "Notes" });
    const added = await service.addTextDocument("owner-1", space.id, {
      title: "Pie",
      content: "apple pie",
      metadata: { source: "test" },
    });

    const updated = await service.updateTextDocument("owner-1", added.id, {
      content: "cherry tart",
    });

    expect(updated).toMatchObject({
      id: added.id,
      title: "Pie",
      content: "cherry tart",
      metadata: { source: "test" },
    });
    expect((await store.listChunks(added.id)).map((chunk) => chunk.content)).toEqual([
      "cherry tart",
    ]);
    expect(await store.chunks.lexicalSearch({}, "apple", 5)).toEqual([]);
    expect(await store.documents.lexicalSearch({}, "apple", 5)).toEqual([]);
    const hits = await store.chunks.lexicalSearch({}, "cherry", 5);
    expect(hits.map((hit) => hit.entity.content)).toEqual(["cherry tart"]);
    await expect(
      service.updateTextDocument("owner-2", added.id, { title: "Stolen" }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("updates only the given search space fields", async () => {
    const space = await service.createSearchSpace("owner-1", {
      name: "Notes",
      description: "old",
    });

    expect(
      await service.updateSearchSpace("owner-1", space.id, { name: " Journal " }),
    ).toMatchObject({ name: "Journal", description: "old" });
    expect(
      await service.updateSearchSpace("owner-1", space.id, { description: null }),
    ).toMatchObject({ name: "Journal", description: null });
    await expect(service.updateSearchSpace("owner-1", space.id, { name: " " })).rejects.toThrow(
      "Search space name must be between 1 and 100 characters.",
    );
    await expect(
      service.updateSearchSpace("owner-2", space.id, { name: "Mine now" }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("caps document listings at the requested limit", async () => {
    const space = await service.createSearchSpace("owner-1", { name: "Notes" });
    await service.addTextDocument("owner-1", space.id, { title: "First", content: "apple" });
    await service.addTextDocument("owner-1", space.id, { title: "Second", content: "banana" });

    const listed = await service.listDocuments("owner-1", undefined, 1);

    expect(listed.map((document) => document.title)).toEqual(["First"]);
  });

  it("answers a non-positive topK without reading the store", async () => {
    const listSpaces = vi.spyOn(store, "listSearchSpaces");

    expect(await service.searchChunks("owner-1", "apple", 0)).toEqual([]);
    expect(await service.searchDocuments("owner-1", "apple", -2)).toEqual([]);
    expect(listSpaces).not.toHaveBeenCalled();
  });
});
