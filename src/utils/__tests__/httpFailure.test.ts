import { readHttpFailure } from "../httpFailure";

describe("readHttpFailure", () => {
    it("reads status, body and Retry-After from a response error", () => {
        const error = Object.assign(new Error("Request failed with status code 429"), {
            response: {
                status: 429,
                data: { message: "slow down" },
                headers: { "retry-after": "7" },
            },
        });

        expect(readHttpFailure(error)).toEqual({
            message: "Request failed with status code 429",
            code: undefined,
            status: 429,
            data: { message: "slow down" },
            retryAfterMs: 7000,
        });
    });

    it("reads the transport code when no response arrived", () => {
        const error = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });

        const failure = readHttpFailure(error);

        expect(failure.code).toBe("ECONNREFUSED");
        expect(failure.status).toBeUndefined();
        expect(failure.retryAfterMs).toBeUndefined();
    });

    it("ignores malformed fields", () => {
        const error = Object.assign(new Error("odd"), {
            code: 42,
            response: { status: "teapot", headers: { "retry-after": "soon" } },
        });

        const failure = readHttpFailure(error);

        expect(failure.message).toBe("odd");
        expect(failure.code).toBeUndefined();
        expect(failure.status).toBeUndefined();
        expect(failure.retryAfterMs).toBeUndefined();
    });

    it("stringifies non-object rejections", () => {
        expect(readHttpFailure("boom")).toEqual({ message: "boom" });
    });
});
