import {
  BlockListPersistence,
  BlockListStore,
} from "../../src/services/block-list-store";

class FakePersistence implements BlockListPersistence {
  saved: string[][] = [];

  constructor(private stored: string[]) {}

  async load(): Promise<string[]> {
    return this.stored;
  }

  async save(countries: readonly string[]): Promise<void> {
    this.saved.push([...countries]);
    this.stored = [...countries];
  }
}

describe("BlockListStore", () => {
  it("should start empty and allow every country", () => {
    const store = new BlockListStore();

    expect(store.list()).toEqual([]);
    expect(store.isBlocked("US")).toBe(false);
  });

  it("should report exactly the codes it was given as blocked", async () => {
    const store = new BlockListStore();
    await store.setBlocked(["RU", "CN"]);

    expect(store.isBlocked("RU")).toBe(true);
    expect(store.isBlocked("CN")).toBe(true);
    expect(store.isBlocked("US")).toBe(false);
    expect(store.isBlocked("DE")).toBe(false);
  });

  it("should discard the previous list on replace", async () => {
    const store = new BlockListStore();
    await store.setBlocked(["RU", "CN"]);
    await store.setBlocked(["DE"]);

    expect(store.list()).toEqual(["DE"]);
    expect(store.isBlocked("RU")).toBe(false);
    expect(store.isBlocked("DE")).toBe(true);
  });

  it("should give the same membership when the same set is applied twice", async () => {
    const store = new BlockListStore();
    await store.setBlocked(["FR", "IT"]);
    const once = store.list();
    await store.setBlocked(["FR", "IT"]);

    expect(store.list()).toEqual(once);
  });

  it("should normalize and de-duplicate codes", async () => {
    const store = new BlockListStore();
    const applied = await store.setBlocked([" de", "DE", "ru ", ""]);

    expect(applied).toEqual(["DE", "RU"]);
    expect(store.isBlocked("de")).toBe(true);
    expect(store.isBlocked(" Ru ")).toBe(true);
  });

  it("should unblock everything when given an empty list", async () => {
    const store = new BlockListStore();
    await store.setBlocked(["DE"]);
    await store.setBlocked([]);

    expect(store.list()).toEqual([]);
    expect(store.isBlocked("DE")).toBe(false);
  });

  it("should list codes in sorted order", async () => {
    const store = new BlockListStore();
    await store.setBlocked(["SE", "AU", "JP"]);

    expect(store.list()).toEqual(["AU", "JP", "SE"]);
  });

  it("should not let a reader's snapshot change on replace", async () => {
    const store = new BlockListStore();
    await store.setBlocked(["DE"]);
    const snapshot = store.list();

    await store.setBlocked(["FR"]);

    expect(snapshot).toEqual(["DE"]);
  });

  describe("with persistence", () => {
    it("should save every replacement", async () => {
      const persistence = new FakePersistence([]);
      const store = new BlockListStore(persistence);

      await store.setBlocked(["cn", "RU"]);

      expect(persistence.saved).toEqual([["CN", "RU"]]);
    });

    it("should keep the current list when saving fails", async () => {
      const persistence = new FakePersistence([]);
      const store = new BlockListStore(persistence);
      await store.setBlocked(["DE"]);
      jest
        .spyOn(persistence, "save")
        .mockRejectedValueOnce(new Error("disk full"));

      await expect(store.setBlocked(["FR"])).rejects.toThrow("disk full");

      expect(store.list()).toEqual(["DE"]);
      expect(store.isBlocked("FR")).toBe(false);
    });

    it("should hydrate from the stored list", async () => {
      const persistence = new FakePersistence(["br", "IN"]);
      const store = new BlockListStore(persistence);

      const loaded = await store.hydrate();

      expect(loaded).toEqual(["BR", "IN"]);
      expect(store.isBlocked("BR")).toBe(true);
    });
  });

  it("should keep the current list when hydrating without persistence", async () => {
    const store = new BlockListStore();
    await store.setBlocked(["DE"]);

    expect(await store.hydrate()).toEqual(["DE"]);
  });
});
