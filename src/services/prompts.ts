/**
 * Prompts for the local model.
 *
 * Written in Polish: the entries, the model and the readers all are.
 */

export const FILTER_SYSTEM_PROMPT = `Jesteś redaktorem lokalnego serwisu informacyjnego i znasz się na Biuletynach Informacji Publicznej.
Oceniasz, które wpisy z rejestrów zmian BIP mają znaczenie dla mieszkańców gminy lub powiatu.
Ważne są: uchwały i zarządzenia dotyczące codziennego życia, przetargi i inwestycje, konsultacje społeczne, obwieszczenia, podatki i opłaty, utrudnienia, zmiany prawa miejscowego.
Nieważne są: wewnętrzne procedury urzędu, techniczne poprawki stron BIP, oświadczenia majątkowe, duplikaty.
Opierasz się wyłącznie na podanym tekście.`;

export function buildFilterPrompt(entriesText: string, instruction?: string): string {
  return `Poniżej znajduje się ponumerowana lista wpisów z rejestrów zmian BIP.

${entriesText}
Wybierz wpisy istotne dla mieszkańców.
Odpowiedz WYŁĄCZNIE tablicą JSON z numerami wybranych wpisów, np. [1, 4].
Jeśli żaden wpis nie jest istotny, odpowiedz [].${instruction ? `\n\nDodatkowe wskazówki: ${instruction}` : ""}`;
}

export const ARTICLE_SYSTEM_PROMPT = `Jesteś rzetelnym dziennikarzem lokalnym.
Piszesz wyłącznie na podstawie dostarczonych wpisów: nie dodajesz faktów, dat, kwot ani opinii, których w nich nie ma.
Styl: informacyjny, prosty i zrozumiały dla każdego mieszkańca.`;

export function buildArticlePrompt(entriesText: string, instruction?: string): string {
  return `Na podstawie poniższych wpisów z BIP przygotuj artykuł do publikacji na stronie internetowej.

Struktura:
1. Tytuł, który mówi, co się zmienia.
2. Lead: najważniejsze informacje w 3-4 zdaniach.
3. Rozwinięcie pogrupowane tematycznie (np. "Inwestycje i przetargi", "Uchwały i zarządzenia"), z konkretami z wpisów.
4. Przy każdym temacie link "Zobacz w BIP" do źródłowego wpisu.
5. Zakończenie z ogólnym odesłaniem do BIP.

Format: HTML (<h2> dla tytułu, <h3> dla sekcji, <p> dla akapitów, <ul>/<li> dla wyliczeń, <a href="..."> dla linków), bez znaczników <html> i <body>.

WPISY:
${entriesText}${instruction ? `\nDodatkowe wskazówki: ${instruction}\n` : ""}
Napisz artykuł.`;
}
