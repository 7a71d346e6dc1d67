import { Observable } from "rxjs";
import { take } from "rxjs/operators";
import { TestScheduler } from "rxjs/testing";
import Coordinator, { CoordinatorData } from "./coordinator";
import type { TrackerState } from "./EvTrackerApi";

const first: TrackerState = { currentMonth: { energyConsumedKwh: 10 } };
const second: TrackerState = { currentMonth: { energyConsumedKwh: 25 } };

function fakeApi(responses: Observable<TrackerState>[]) {
  return {
    getState$: vi.fn(() => {
      const next = responses.shift();
      if (!next) {
        throw new Error("no more responses");
      }
      return next;
    }),
  };
}

describe("Coordinator", () => {
  let testScheduler: TestScheduler;

  beforeEach(() => {
    testScheduler = new TestScheduler((actual, expected) => {
      expect(actual).toEqual(expected);
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should poll right away and then every interval", () => {
    testScheduler.run(({ cold, expectObservable }) => {
      const api = fakeApi([
        cold("-a|", { a: first }),
        cold("-b|", { b: second }),
        cold("-a|", { a: first }),
      ]);
      const coordinator = new Coordinator(api, { carId: 7, updateInterval: 5 });

      const values: Record<string, CoordinatorData> = {
        a: { state: first, lastUpdateSuccess: true },
        b: { state: second, lastUpdateSuccess: true },
      };

      expectObservable(coordinator.data$.pipe(take(3))).toBe(
        "-a----b----(a|)",
        values
      );
    });
  });

  it("should keep the previous statistics when a poll fails", () => {
    testScheduler.run(({ cold, expectObservable }) => {
      const api = fakeApi([
        cold("-a|", { a: first }),
        cold("-#", undefined, new Error("Server error: 503 - maintenance")),
        cold("-b|", { b: second }),
      ]);
      const coordinator = new Coordinator(api, { carId: 7, updateInterval: 5 });

      expectObservable(coordinator.data$.pipe(take(3))).toBe(
        "-a----f----(b|)",
        {
          a: { state: first, lastUpdateSuccess: true },
          f: { state: first, lastUpdateSuccess: false },
          b: { state: second, lastUpdateSuccess: true },
        }
      );
    });
  });

  it("should report a failed first poll without statistics", () => {
    testScheduler.run(({ cold, expectObservable }) => {
      const api = fakeApi([cold("-#", undefined, new Error("offline"))]);
      const coordinator = new Coordinator(api, { carId: 7, updateInterval: 5 });

      expectObservable(coordinator.data$.pipe(take(1))).toBe("-(f|)", {
        f: { state: undefined, lastUpdateSuccess: false },
      });
    });
  });

  it("should poll again when a refresh is requested", () => {
    testScheduler.run(({ cold, expectObservable }) => {
      const api = fakeApi([
        cold("-a|", { a: first }),
        cold("-b|", { b: second }),
        cold("-a|", { a: first }),
      ]);
      const coordinator = new Coordinator(api, {
        carId: 7,
        updateInterval: 10,
      });

      cold("---x").subscribe(() => coordinator.requestRefresh());

      expectObservable(coordinator.data$.pipe(take(3))).toBe(
        "-a--b------(a|)",
        {
          a: { state: first, lastUpdateSuccess: true },
          b: { state: second, lastUpdateSuccess: true },
        }
      );
    });
  });
});
