import { extractLinks } from "../src/links";

describe("extractLinks", () => {
  it("should resolve hrefs against the page URL and drop non-page targets", () => {
    const html = `
      <a href="/about">About</a>
      <a href="contact.html">Contact</a>
      <a href="#top">Top</a>
      <a href="mailto:someone@site.test">Mail</a>
      <a href="https://other.test/page#frag">Other</a>
      <a>No href</a>
      <a href="javascript:void(0)">Script</a>
      <a href="ftp://files.test/x">Files</a>`;

    expect(extractLinks(html, "https://site.test/dir/index.html")).toEqual([
      "https://site.test/about",
      "https://site.test/dir/contact.html",
      "https://other.test/page#frag",
    ]);
  });

  it("should cope with malformed markup", () => {
    const html = "<div><a href=\"/x\">unclosed<p><a href='/y'>second";

    expect(extractLinks(html, "https://site.test/")).toEqual(["https://site.test/x", "https://site.test/y"]);
  });

  it("should trim whitespace around hrefs", () => {
    expect(extractLinks('<a href="  /spaced  ">S</a>', "https://site.test/")).toEqual(["https://site.test/spaced"]);
  });

  it("should return nothing for a page without anchors", () => {
    expect(extractLinks("plain text body", "https://site.test/")).toEqual([]);
  });
});
