// tests/api/admin.test.ts
import { beforeEach, describe, expect, it } from "@jest/globals";
import request from "supertest";
import { bearer, createBooking, createVehicle, signUp, testApp } from "../support/app";
import type { SignedUp, TestApp } from "../support/app";

describe("admin bulk actions", () => {
  let t: TestApp;
  let manager: SignedUp;
  let customer: SignedUp;

  beforeEach(async () => {
    t = testApp();
    manager = await signUp(t, "lindiwe", "manager");
    customer = await signUp(t, "thandi");
  });

  it("lists the available actions by entity", async () => {
    const res = await request(t.app).get("/api/admin/actions").set(bearer(manager)).expect(200);
    expect(res.body.bookings).toEqual(["confirm", "start", "complete", "cancel"]);
    expect(res.body.payments).toEqual(["process", "mark_failed", "refund"]);
  });

  it("is closed to plain staff", async () => {
    const staff = await signUp(t, "sipho", "staff");
    await request(t.app).get("/api/admin/actions").set(bearer(staff)).expect(403);
  });

  it("confirms only the bookings still pending", async () => {
    const first = await createVehicle(t.app, manager);
    const second = await createVehicle(t.app, manager, { licensePlate: "BT 5678" });
    const a = await createBooking(t.app, customer, first.id);
    const b = await createBooking(t.app, customer, second.id);
    await request(t.app).post(`/api/bookings/${b.id}/cancel`).set(bearer(customer)).send({}).expect(200);

    const res = await request(t.app)
      .post("/api/admin/actions/bookings/confirm")
      .set(bearer(manager))
      .send({ ids: [a.id, b.id, a.id] })
      .expect(200);
    expect(res.body).toEqual({ updated: 1 });

    const confirmed = await request(t.app).get(`/api/bookings/${a.id}`).set(bearer(customer)).expect(200);
    expect(confirmed.body.status).toBe("confirmed");
    const untouched = await request(t.app).get(`/api/bookings/${b.id}`).set(bearer(customer)).expect(200);
    expect(untouched.body.status).toBe("cancelled");
  });

  it("starts bookings one by one and skips the ones that cannot start", async () => {
    const vehicle = await createVehicle(t.app, manager);
    const pending = await createBooking(t.app, customer, vehicle.id);
    const other = await createVehicle(t.app, manager, { licensePlate: "BT 5678" });
    const confirmed = await createBooking(t.app, customer, other.id);
    await request(t.app).post(`/api/bookings/${confirmed.id}/confirm`).set(bearer(manager)).expect(200);

    const res = await request(t.app)
      .post("/api/admin/actions/bookings/start")
      .set(bearer(manager))
      .send({ ids: [pending.id, confirmed.id] })
      .expect(200);
    expect(res.body).toEqual({ updated: 1 });

    const started = await request(t.app).get(`/api/bookings/${confirmed.id}`).set(bearer(manager)).expect(200);
    expect(started.body).toMatchObject({ status: "active", pickupMileage: 12000 });
  });

  it("toggles vehicle flags in bulk", async () => {
    const vehicle = await createVehicle(t.app, manager);
    await request(t.app)
      .post("/api/admin/actions/vehicles/feature")
      .set(bearer(manager))
      .send({ ids: [vehicle.id] })
      .expect(200, { updated: 1 });
    const res = await request(t.app).get("/api/vehicles").query({ featured: "true" }).expect(200);
    expect(res.body.map((v: { id: string }) => v.id)).toEqual([vehicle.id]);
  });

  it("answers unknown actions with not found", async () => {
    const res = await request(t.app)
      .post("/api/admin/actions/bookings/teleport")
      .set(bearer(manager))
      .send({ ids: ["01BOOKING00000000000000000"] })
      .expect(404);
    expect(res.body.error).toBe("admin_action_not_found");
  });
});
