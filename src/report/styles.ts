/**
 * Inline stylesheet for print (A4) rendering.
 *
 * Kept inside the document so the HTML can be handed to any HTML→PDF renderer
 * without external assets.
 */
export const REPORT_STYLES = `
@page {
  size: A4;
  margin: 1.2cm 1.5cm;
}
body {
  font-family: "Inter", "Helvetica Neue", "Arial", "Hiragino Kaku Gothic Pro", "Yu Gothic", sans-serif;
  line-height: 1.8;
  color: #1a1a1a;
  max-width: 100%;
  margin: 0 auto;
  padding: 16px;
  font-size: 20px;
}
h1 {
  color: #111;
  border-bottom: 3px solid #2563eb;
  padding-bottom: 12px;
  font-size: 38px;
  font-weight: 700;
  margin-bottom: 24px;
}
h2 {
  color: #1f2937;
  border-left: 4px solid #2563eb;
  padding-left: 16px;
  margin-top: 40px;
  margin-bottom: 16px;
  font-size: 30px;
  font-weight: 600;
}
h3 {
  color: #374151;
  font-size: 24px;
  font-weight: 600;
  margin-top: 24px;
}
h4, h5, h6 {
  color: #4b5563;
  font-size: 20px;
  font-weight: 600;
  margin-top: 20px;
}
.metadata {
  color: #7f8c8d;
  font-size: 18px;
  margin-bottom: 30px;
}
p {
  margin: 16px 0;
  text-align: justify;
}
ul, ol {
  margin: 16px 0;
  padding-left: 28px;
}
li {
  margin: 8px 0;
}
figure {
  margin: 20px 0;
  text-align: center;
  page-break-inside: avoid;
}
figure img {
  max-width: 100%;
  max-height: 500px;
  width: auto;
  height: auto;
  object-fit: contain;
  border: 1px solid #ddd;
  border-radius: 4px;
}
figcaption {
  font-size: 16px;
  color: #666;
  margin-top: 8px;
  font-style: italic;
}
.missing-image-box {
  background: #f0f0f0;
  padding: 40px;
  text-align: center;
  border: 1px dashed #ccc;
}
.images-section, .diagrams-section {
  margin-top: 40px;
  page-break-before: always;
}
strong {
  color: #2c3e50;
}
blockquote {
  margin: 24px 0;
  padding: 16px 24px;
  background: #f8f9fa;
  border-left: 4px solid #2563eb;
  font-style: italic;
  color: #4b5563;
}
hr {
  border: none;
  border-top: 1px solid #e5e7eb;
  margin: 32px 0;
}
a {
  color: #2563eb;
  text-decoration: none;
}
table {
  width: 100%;
  border-collapse: collapse;
  margin: 20px 0;
  font-size: 14px;
}
th, td {
  border: 1px solid #e5e7eb;
  padding: 12px;
  text-align: left;
}
th {
  background-color: #f8fafc;
  font-weight: 600;
  color: #1f2937;
}
tr:nth-child(even) {
  background-color: #f9fafb;
}
.content > h1:first-child {
  display: none;
}
.toc {
  background: #f8fafc;
  border: 1px solid #e2e8f0;
  border-radius: 8px;
  padding: 20px 24px;
  margin: 20px 0 32px 0;
}
.toc h2 {
  margin-top: 0;
  border-left: none;
  padding-left: 0;
  font-size: 20px;
}
.toc ul {
  list-style: none;
  padding-left: 0;
  margin: 12px 0 0 0;
}
.toc li {
  margin: 6px 0;
  font-size: 14px;
}
.image-columns {
  display: flex;
  flex-wrap: wrap;
  gap: 16px;
  justify-content: center;
  margin: 20px 0;
}
.image-columns .column-item {
  flex: 1 1 calc(50% - 16px);
  max-width: calc(50% - 8px);
  margin: 0;
}
.image-columns .column-item img {
  max-height: 400px;
  border: none;
}
.image-columns figcaption {
  font-size: 11px;
  text-align: center;
}
`;
