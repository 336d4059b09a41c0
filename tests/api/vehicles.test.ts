// tests/api/vehicles.test.ts
import { beforeEach, describe, expect, it } from "@jest/globals";
import request from "supertest";
import { UNIQUE } from "../../src/store/constraints";
import { bearer, createVehicle, signUp, testApp } from "../support/app";
import type { SignedUp, TestApp } from "../support/app";

describe("vehicle images", () => {
  let t: TestApp;
  let staff: SignedUp;
  let vehicleId: string;

  beforeEach(async () => {
    t = testApp();
    staff = await signUp(t, "sipho", "staff");
    vehicleId = (await createVehicle(t.app, staff)).id;
  });

  it("keeps a single primary image per vehicle", async () => {
    await request(t.app)
      .post(`/api/vehicles/${vehicleId}/images`)
      .set(bearer(staff))
      .send({ url: "https://img.example.com/front.jpg", isPrimary: true })
      .expect(201);
    await request(t.app)
      .post(`/api/vehicles/${vehicleId}/images`)
      .set(bearer(staff))
      .send({ url: "https://img.example.com/side.jpg", isPrimary: true })
      .expect(201);

    const res = await request(t.app).get(`/api/vehicles/${vehicleId}`).expect(200);
    expect(res.body.images.map((i: { url: string; isPrimary: boolean }) => [i.url, i.isPrimary])).toEqual([
      ["https://img.example.com/front.jpg", false],
      ["https://img.example.com/side.jpg", true],
    ]);
  });

  it("refuses a second primary row written without demoting the first", async () => {
    const row = {
      vehicleId,
      url: "https://img.example.com/front.jpg",
      imageType: "exterior" as const,
      caption: null,
      isPrimary: true,
      sortOrder: 0,
      uploadedBy: staff.id,
      createdAt: new Date("2026-11-01T08:00:00Z"),
    };
    await t.store.images.insert({ ...row, id: "img-1" });

    await expect(t.store.images.insert({ ...row, id: "img-2" })).rejects.toMatchObject({ constraint: UNIQUE.primaryImage });
  });
});
