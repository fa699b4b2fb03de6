import { getLongname } from "./getLongname";

describe("getLongname", () => {
	it("should describe a file", () => {
		expect(
			getLongname("report.pdf", { type: "file", size: 2048, permissions: 0o640 }),
		).toBe("-rw-r----- 1 nobody nogroup 2048 report.pdf");
	});

	it("should describe a directory", () => {
		expect(getLongname("photos", { type: "directory", permissions: 0o755 })).toBe(
			"drwxr-xr-x 1 nobody nogroup 0 photos",
		);
	});

	it("should mark unknown permissions", () => {
		expect(getLongname("socket", { type: "other" })).toBe(
			"?????????? 1 nobody nogroup 0 socket",
		);
	});

	it("should use the given owner and group", () => {
		expect(
			getLongname("a.txt", { type: "file", size: 1, permissions: 0o600 }, "alice", "staff"),
		).toBe("-rw------- 1 alice staff 1 a.txt");
	});
});
