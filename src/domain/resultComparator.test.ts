import { compareResults, diffRows, judgeOutcome } from "./resultComparator";
import { createResultSet, failure, success } from "./resultSet";

describe("resultComparator", () => {
  const students = createResultSet(
    ["id", "name", "marks"],
    [
      [1, "Swastik", 99],
      [2, "Sid", 98],
      [3, "Asha", 91],
    ]
  );

  describe("compareResults", () => {
    it("passes identical result sets", () => {
      const verdict = compareResults(1, students, students);

      expect(verdict.status).toBe("PASS");
      expect(verdict.diff).toBeUndefined();
      expect(verdict.notes).toEqual([]);
    });

    it("passes every row permutation", () => {
      const permutations = [
        [students.rows[2], students.rows[0], students.rows[1]],
        [students.rows[1], students.rows[2], students.rows[0]],
        [students.rows[2], students.rows[1], students.rows[0]],
      ];

      for (const rows of permutations) {
        const shuffled = createResultSet(["id", "name", "marks"], rows.map((r) => [...r]));
        expect(compareResults(1, students, shuffled).status).toBe("PASS");
      }
    });

    it("fails when a row is missing and lists it", () => {
      const actual = createResultSet(["id", "name", "marks"], [
        [1, "Swastik", 99],
        [3, "Asha", 91],
      ]);

      const verdict = compareResults(4, students, actual);

      expect(verdict.questionIndex).toBe(4);
      expect(verdict.status).toBe("FAIL");
      expect(verdict.failure).toBe("mismatch");
      expect(verdict.diff).toBe("Missing rows: {(2,'Sid',98)}");
    });

    it("lists missing and extra rows together", () => {
      const actual = createResultSet(["id", "name", "marks"], [
        [1, "Swastik", 99],
        [2, "Sid", 98],
        [4, "Ravi", 60],
      ]);

      const verdict = compareResults(1, students, actual);

      expect(verdict.diff).toBe("Missing rows: {(3,'Asha',91)}\nExtra rows: {(4,'Ravi',60)}");
    });

    it("counts duplicate rows", () => {
      const expected = createResultSet(["marks"], [[98], [98]]);
      const actual = createResultSet(["marks"], [[98]]);

      const verdict = compareResults(1, expected, actual);

      expect(verdict.status).toBe("FAIL");
      expect(verdict.diff).toBe("Missing rows: {(98)}");
    });

    it("only notes differing column names", () => {
      const aliased = createResultSet(["ID", "student_name", "MARKS"], students.rows.map((r) => [...r]));

      const verdict = compareResults(1, students, aliased);

      expect(verdict.status).toBe("PASS");
      expect(verdict.notes).toEqual([
        "Column names differ: expected [id, name, marks], got [ID, student_name, MARKS]",
      ]);
    });

    it("fails on a different column count", () => {
      const narrower = createResultSet(["id", "name"], [[1, "Swastik"]]);
      const expected = createResultSet(["id", "name", "marks"], [[1, "Swastik", 99]]);

      const verdict = compareResults(1, expected, narrower);

      expect(verdict.status).toBe("FAIL");
      expect(verdict.diff).toBe(
        "Column count mismatch: expected 3 [id, name, marks], got 2 [id, name]\n" +
          "Missing rows: {(1,'Swastik',99)}\n" +
          "Extra rows: {(1,'Swastik')}"
      );
    });

    it("compares numbers by value", () => {
      const expected = createResultSet(["total"], [[197]]);
      const actual = createResultSet(["total"], [[BigInt(197)]]);

      expect(compareResults(1, expected, actual).status).toBe("PASS");
      expect(compareResults(1, createResultSet(["x"], [[0]]), createResultSet(["x"], [[-0]])).status).toBe("PASS");
    });

    it("does not confuse numbers with their text", () => {
      const expected = createResultSet(["total"], [[197]]);
      const actual = createResultSet(["total"], [["197"]]);

      const verdict = compareResults(1, expected, actual);

      expect(verdict.status).toBe("FAIL");
      expect(verdict.diff).toBe("Missing rows: {(197)}\nExtra rows: {('197')}");
    });

    it("keeps string comparison exact", () => {
      const expected = createResultSet(["name"], [["Sid"]]);

      expect(compareResults(1, expected, createResultSet(["name"], [["sid"]])).status).toBe("FAIL");
      expect(compareResults(1, expected, createResultSet(["name"], [["Sid "]])).status).toBe("FAIL");
    });

    it("matches null only with null", () => {
      const expected = createResultSet(["grade"], [[null]]);

      expect(compareResults(1, expected, createResultSet(["grade"], [[null]])).status).toBe("PASS");
      const verdict = compareResults(1, expected, createResultSet(["grade"], [["NULL"]]));
      expect(verdict.diff).toBe("Missing rows: {(NULL)}\nExtra rows: {('NULL')}");
    });
  });

  describe("diffRows", () => {
    it("returns empty differences for equal multisets", () => {
      expect(diffRows([[1], [2], [2]], [[2], [1], [2]])).toEqual({ missing: [], extra: [] });
    });

    it("reports surplus copies on the side that has them", () => {
      expect(diffRows([[1]], [[1], [1], [1]])).toEqual({ missing: [], extra: [[1], [1]] });
    });
  });

  describe("judgeOutcome", () => {
    it("fails an execution error with the engine message and skips comparison", () => {
      const verdict = judgeOutcome(2, students, failure('near "SELEC": syntax error'));

      expect(verdict).toEqual({
        questionIndex: 2,
        status: "FAIL",
        failure: "execution_error",
        diff: 'near "SELEC": syntax error',
        notes: [],
        expected: students,
        actual: { kind: "error", message: 'near "SELEC": syntax error' },
      });
    });

    it("compares a successful outcome", () => {
      expect(judgeOutcome(1, students, success(students)).status).toBe("PASS");
    });
  });
});
