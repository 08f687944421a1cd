import { describe, expect, it } from "vitest";
import { parseListPage, parseReviewCount, parseReviewPage } from "../connectors/page-parser";

const LIST_HTML = `
<div class="list-row J_ListRow" data-shid="1001" data-name="Garden Hotel" data-lat="23.12" data-lng="113.26">
  <span class="row-subtitle" title="Luxury">five star</span>
  <div class="row-address">  368 Huanshi Road  </div>
  <div class="comment-score"><span class="score">4.7</span><span class="count">(2,315 reviews)</span></div>
  <div class="pi-price">¥1,280起</div>
</div>
<div class="list-row J_ListRow" data-shid="1002" data-name=" ">
  <div class="pi-price">sold out</div>
</div>
<div class="pi-pagination">
  <span class="pi-pagination-current">2</span>
  <a class="pi-pagination-next">next</a>
</div>`;

const REVIEW_HTML = `
<div id="hotel-review"><ul>
  <li class="tb-r-comment">
    <div class="tb-r-nick"><a title="amy_w">amy</a></div>
    <div class="comment-name">Lovely &amp; quiet</div>
    <ul class="starscore">
      <li><em style="width:80%"></em></li>
      <li><em style="width:100%"></em></li>
      <li><em style="width:60%"></em></li>
      <li><em></em></li>
    </ul>
    <div class="tb-r-cnt">  Great breakfast, 交通便利 </div>
    <div class="tb-r-photos"><img data-val="https://img.example.com/r1.jpg"><img src="thumb.jpg"></div>
    <div class="tb-r-info"><span class="tb-r-date">[2026-01-11 20:34]</span></div>
    <div class="tb-r-seller">Thank you for staying!</div>
    <div class="tb-r-info"><span class="tb-r-date">[2026-01-12 09:00]</span></div>
  </li>
  <li class="tb-r-comment">
    <div class="tb-r-cnt">   </div>
  </li>
  <li class="tb-r-comment">
    <div class="tb-r-cnt">Okay</div>
  </li>
</ul></div>
<a class="pi-pagination-next pi-pagination-disabled">next</a>`;

describe("parseListPage", () => {
  it("reads listing rows and pagination", () => {
    const page = parseListPage(LIST_HTML);

    expect(page.records).toEqual([
      {
        hotelId: "1001",
        name: "Garden Hotel",
        address: "368 Huanshi Road",
        latitude: 23.12,
        longitude: 113.26,
        starLevel: "Luxury",
        ratingScore: 4.7,
        reviewCount: 2315,
        basePrice: 1280,
      },
      {
        hotelId: "1002",
        name: null,
        address: null,
        latitude: null,
        longitude: null,
        starLevel: null,
        ratingScore: null,
        reviewCount: null,
        basePrice: null,
      },
    ]);
    expect(page.pagination).toEqual({ page: 2, hasNext: true });
  });

  it("returns an empty last page for markup without rows", () => {
    expect(parseListPage("<p>no results</p>")).toEqual({
      records: [],
      pagination: { page: 1, hasNext: false },
    });
  });
});

describe("parseReviewPage", () => {
  it("reads reviews with scores, photos and merchant replies", () => {
    const page = parseReviewPage(REVIEW_HTML);

    expect(page.records).toHaveLength(2);
    expect(page.records[0]).toEqual({
      authorHandle: "amy_w",
      content: "Great breakfast, 交通便利",
      summary: "Lovely & quiet",
      scores: { clean: 4, location: 5, service: 3, value: null },
      date: "[2026-01-11 20:34]",
      imageUrls: ["https://img.example.com/r1.jpg"],
      reply: { content: "Thank you for staying!", date: "[2026-01-12 09:00]" },
    });
    expect(page.records[1]).toEqual({
      authorHandle: null,
      content: "Okay",
      summary: null,
      scores: { clean: null, location: null, service: null, value: null },
      date: null,
      imageUrls: [],
      reply: null,
    });
    expect(page.pagination).toEqual({ page: 1, hasNext: false });
  });
});

describe("parseReviewCount", () => {
  it("tries each count location in turn", () => {
    expect(parseReviewCount('<span id="J_ReviewCount">（共1,024条）</span>')).toBe(1024);
    expect(
      parseReviewCount('<span id="J_ReviewCount"></span><li class="comments"><a>评论(88)</a></li>'),
    ).toBe(88);
    expect(parseReviewCount("<div>nothing here</div>")).toBeNull();
  });
});
