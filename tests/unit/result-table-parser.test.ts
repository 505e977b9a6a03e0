import { describe, expect, it } from "vitest";
import {
  DEFAULT_ROW_CLASSIFICATION_RULES,
  isHeaderRow,
  parseResultTable,
  type RowClassificationRules
} from "../../pipeline/services/result-table-parser.js";
import { NO_RESULTS_HTML } from "../test-utils.js";

const table = (rows: string): string => `<html><body><table class="list">${rows}</table></body></html>`;

const BASE_URL = "https://portal.test";

describe("parseResultTable", () => {
  it("maps five-cell rows and skips the label row", () => {
    const html = table(`
      <tr><td>번호</td><td>시간</td><td>회사명</td><td>공시제목</td><td>제출인</td></tr>
      <tr>
        <td>1</td>
        <td>2024-03-04 18:02</td>
        <td><a href="#company">테스트바이오</a></td>
        <td>
          <a href="#viewer" onclick="openDisclsViewer('20240304000801','20240304001234','v1', '')">
            투자경고종목
            지정
          </a>
        </td>
        <td>코스닥시장본부</td>
      </tr>
      <tr>
        <td>2</td>
        <td>2024-03-04 17:40</td>
        <td>샘플전자</td>
        <td><a href="#viewer" onclick="openDisclsViewer('20240304000700','20240304001100','v2', '')">투자경고종목 지정 해제</a></td>
        <td>유가증권시장본부</td>
      </tr>
    `);

    const outcome = parseResultTable(html, { baseUrl: BASE_URL });

    expect(outcome.kind).toBe("rows");
    if (outcome.kind !== "rows") return;
    expect(outcome.selector).toBe("tbody tr:has(td)");
    expect(outcome.rejectedRows).toBe(0);
    expect(outcome.records).toEqual([
      {
        rowNumber: "1",
        datetime: "2024-03-04 18:02",
        companyName: "테스트바이오",
        title: "투자경고종목 지정",
        submitter: "코스닥시장본부",
        disclosureLink: {
          accessionNumber: "20240304000801",
          documentNumber: "20240304001234",
          viewerHost: "v1",
          url: "https://portal.test/common/disclsviewer.do?method=search&acptno=20240304000801&docno=20240304001234&viewerhost=v1&viewerport="
        },
        isRedesignation: false,
        isPreferredStock: false,
        designationType: "designation"
      },
      {
        rowNumber: "2",
        datetime: "2024-03-04 17:40",
        companyName: "샘플전자",
        title: "투자경고종목 지정 해제",
        submitter: "유가증권시장본부",
        disclosureLink: {
          accessionNumber: "20240304000700",
          documentNumber: "20240304001100",
          viewerHost: "v2",
          url: "https://portal.test/common/disclsviewer.do?method=search&acptno=20240304000700&docno=20240304001100&viewerhost=v2&viewerport="
        },
        isRedesignation: false,
        isPreferredStock: false,
        designationType: "cancellation"
      }
    ]);
  });

  it("numbers four-cell rows by their position among data rows", () => {
    const html = table(`
      <tr><td>시간</td><td>회사명</td><td>공시제목</td><td>제출인</td></tr>
      <tr><td>2024.02.01 09:15</td><td>가나다</td><td>투자경고종목 재지정</td><td>코스닥시장본부</td></tr>
      <tr><td>2024.02.02 10:20</td><td>라마바</td><td>투자경고종목 지정 (우선주)</td><td>코스닥시장본부</td></tr>
    `);

    const outcome = parseResultTable(html, { baseUrl: BASE_URL });

    expect(outcome.kind).toBe("rows");
    if (outcome.kind !== "rows") return;
    expect(outcome.records.map((record) => record.rowNumber)).toEqual(["1", "2"]);
    expect(outcome.records[0]).toMatchObject({
      datetime: "2024.02.01 09:15",
      companyName: "가나다",
      submitter: "코스닥시장본부",
      disclosureLink: null,
      isRedesignation: true,
      designationType: "designation"
    });
    expect(outcome.records[1]?.isPreferredStock).toBe(true);
  });

  it("reads three-cell rows without a submitter", () => {
    const html = table(`<tr><td>2024-01-10 08:00</td><td>사아자</td><td>투자경고종목 안내</td></tr>`);

    const outcome = parseResultTable(html, { baseUrl: BASE_URL });

    expect(outcome.kind).toBe("rows");
    if (outcome.kind !== "rows") return;
    expect(outcome.records).toHaveLength(1);
    expect(outcome.records[0]).toMatchObject({
      rowNumber: "1",
      submitter: "",
      designationType: "other"
    });
  });

  it("rejects adversarial rows and keeps the real one", () => {
    const html = table(`
      <tr><td>No.</td><td>Time</td><td>Company</td><td>Title</td><td>Submitter</td></tr>
      <tr><td>TIME</td><td>x</td><td>y</td></tr>
      <tr><td>1</td><td>2024-01-10</td></tr>
      <tr><td>2</td><td>09:00</td><td>차카타</td><td>투자경고종목 지정</td><td>코스닥시장본부</td></tr>
      <tr><td>3</td><td>2024-01-11 09:00</td><td>파하</td><td>제목</td><td>x</td></tr>
      <tr><td>4</td><td>2024-01-11 09:30</td><td> </td><td>투자경고종목 지정</td><td>x</td></tr>
      <tr><td>5</td><td>2024-01-12 10:00</td><td>가람</td><td><a href="#" onclick="openDisclsViewer('1','2','3')">Title</a></td><td>x</td></tr>
      <tr><td>6</td><td>2024-01-12 11:00</td><td>나래</td><td>투자경고종목 지정</td><td>코스닥시장본부</td></tr>
    `);

    const outcome = parseResultTable(html, { baseUrl: BASE_URL });

    expect(outcome.kind).toBe("rows");
    if (outcome.kind !== "rows") return;
    expect(outcome.rejectedRows).toBe(4);
    expect(outcome.records.map((record) => [record.rowNumber, record.companyName])).toEqual([
      ["6", "나래"]
    ]);
  });

  it("reports a known empty-result page as no results", () => {
    expect(parseResultTable(NO_RESULTS_HTML)).toEqual({ kind: "no-results" });
  });

  it("only matches an empty-result marker in an element's own text", () => {
    expect(parseResultTable("<html><body><div class=\"empty\">데이터가 없습니다</div></body></html>")).toEqual({
      kind: "no-results"
    });
    expect(
      parseResultTable("<html><body><div class=\"wrap\"><p>데이터가 없습니다</p></div></body></html>")
    ).toEqual({ kind: "unrecognized", reason: "no data rows and no empty-result marker" });
  });

  it("reports an unknown layout as unrecognized", () => {
    expect(parseResultTable("<html><body><p>점검 중입니다</p></body></html>")).toEqual({
      kind: "unrecognized",
      reason: "no data rows and no empty-result marker"
    });
  });

  it("reports a table whose rows were all rejected as unrecognized", () => {
    const html = table(`<tr><td>1</td><td>09:00</td><td>차카타</td><td>투자경고종목 지정</td><td>x</td></tr>`);

    expect(parseResultTable(html)).toEqual({
      kind: "unrecognized",
      reason: "all 1 data row(s) matched by tbody tr:has(td) were rejected"
    });
  });

  it("returns the same outcome for the same HTML", () => {
    const html = table(`<tr><td>1</td><td>2024-01-12 11:00</td><td>나래</td><td>투자경고종목 지정</td><td>x</td></tr>`);

    expect(parseResultTable(html, { baseUrl: BASE_URL })).toEqual(parseResultTable(html, { baseUrl: BASE_URL }));
  });

  it("accepts an extended rule set", () => {
    const html = table(`<tr><td>구분</td><td>2024-01-12 11:00</td><td>가람</td><td>투자경고종목 지정</td><td>x</td></tr>`);
    const rules: RowClassificationRules = {
      ...DEFAULT_ROW_CLASSIFICATION_RULES,
      version: 2,
      headerKeywords: [...DEFAULT_ROW_CLASSIFICATION_RULES.headerKeywords, "구분"]
    };

    const withDefaults = parseResultTable(html);
    expect(withDefaults.kind === "rows" ? withDefaults.records[0]?.rowNumber : null).toBe("구분");

    expect(parseResultTable(html, { rules }).kind).toBe("unrecognized");
  });
});

describe("isHeaderRow", () => {
  it("treats empty and label cells as headers", () => {
    expect(isHeaderRow("번호", DEFAULT_ROW_CLASSIFICATION_RULES)).toBe(true);
    expect(isHeaderRow("  접수번호 ", DEFAULT_ROW_CLASSIFICATION_RULES)).toBe(true);
    expect(isHeaderRow("", DEFAULT_ROW_CLASSIFICATION_RULES)).toBe(true);
    expect(isHeaderRow("17", DEFAULT_ROW_CLASSIFICATION_RULES)).toBe(false);
    expect(isHeaderRow("2024-01-12 11:00", DEFAULT_ROW_CLASSIFICATION_RULES)).toBe(false);
  });
});
