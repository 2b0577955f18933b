/**
 * Test fixtures.
 */

import type { Entry } from "../../src/aggregators/base/types";

export const REGISTRY_PAGE_URL = "https://bip.example.pl/rejestr-zmian";

export const REGISTRY_TABLE_HTML = `<!DOCTYPE html>
<html><head><meta charset="utf-8"><title>Rejestr zmian</title></head>
<body><main>
<table>
  <thead><tr><th>Zmieniono</th><th>Tytuł</th><th>Użytkownik</th></tr></thead>
  <tbody>
    <tr><td>śr., 11/02/2026 - 14:42</td><td><a href="/uchwala-nr-xii-2026">Uchwała nr XII/2026 w sprawie budżetu</a></td><td>Jan Kowalski</td></tr>
    <tr><td>10.02.2026</td><td><a href="https://bip.example.pl/przetarg-drogi#szczegoly">Przetarg na remont drogi gminnej</a></td><td>Anna Nowak</td></tr>
    <tr><td>brak daty</td><td><a href="/ogloszenie-o-naborze">Ogłoszenie o naborze na stanowisko</a></td><td>Anna Nowak</td></tr>
    <tr><td>09.02.2026</td><td><a href="/uchwala-nr-xii-2026">Uchwała nr XII/2026 w sprawie budżetu</a></td><td>Jan Kowalski</td></tr>
    <tr><td>08.02.2026</td><td><a href="/rejestr-zmian?page=2">2</a></td><td></td></tr>
  </tbody>
</table>
</main></body></html>`;

export const RECENT_BLOCKS_HTML = `<html><body>
<div class="view-content">
  <div class="views-row">
    <h3><a href="/aktualnosci/konsultacje-spoleczne">Konsultacje społeczne planu miejscowego</a></h3>
    <span class="date">12.02.2026</span>
    <p>Zapraszamy mieszkańców do udziału w konsultacjach.</p>
  </div>
  <div class="views-row">
    <h3><a href="/aktualnosci/obwieszczenie-wojta">Obwieszczenie Wójta Gminy</a></h3>
    <p>Opublikowano 5 lutego 2026, 09:30</p>
  </div>
  <div class="views-row"><span>Blok bez odnośnika</span></div>
</div>
</body></html>`;

export const CONTENT_LINKS_HTML = `<html><body>
<header><a href="/kontakt">Kontakt z urzędem gminy</a></header>
<main>
  <a href="/rejestr-zmian?strona=2">Następna strona rejestru</a>
  <a href="/dokumenty/uchwala-budzetowa-2026">Uchwała budżetowa na rok 2026</a>
  <a href="/dokumenty/krotki">Krótki</a>
  <a href="mailto:urzad@example.pl">urzad@example.pl napisz do nas</a>
  <a href="/dokumenty/plan-zamowien">Plan zamówień publicznych</a>
</main>
</body></html>`;

export const NEWS_LIST_PAGE_URL = "https://bip.example.pl/ogloszenia";

export const NEWS_LIST_HTML = `<html><body>
<ul class="lista">
  <li><a href="/ogloszenia/123">Ogłoszenie o przetargu</a></li>
  <li><a href="ogloszenie-124">Nabór wniosków</a></li>
  <li><a href="#top">Do góry</a></li>
</ul>
<div class="ogloszenie"><a href="/ogloszenia/125">Obwieszczenie o zebraniu wiejskim</a> <span>03.02.2025</span></div>
</body></html>`;

export const FEED_URL = "https://www.wzorowo.example.pl/aktualnosci/rss.xml";

export const RSS_XML = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Aktualności</title>
    <link>https://www.wzorowo.example.pl/aktualnosci</link>
    <description>Aktualności gminy</description>
    <item>
      <title>Sesja Rady Gminy</title>
      <link>/aktualnosci/sesja-rady</link>
      <description>Porządek obrad sesji.</description>
      <pubDate>Mon, 03 Feb 2025 10:00:00 GMT</pubDate>
    </item>
    <item>
      <title>Komunikat bez daty</title>
      <link>https://www.wzorowo.example.pl/aktualnosci/komunikat</link>
    </item>
  </channel>
</rss>`;

/**
 * Build an aggregated entry with sensible defaults.
 */
export function makeEntry(overrides: Partial<Entry> = {}): Entry {
  return {
    title: "Uchwała w sprawie opłat za odpady",
    url: "https://bip.example.pl/uchwala-odpady",
    summary: "",
    content: "",
    published: null,
    sourceName: "UM Przykładowo",
    ...overrides,
  };
}
