/** Pages HTML du serveur */

const escapeHtml = (s: string): string =>
  s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;').replace(/'/g, '&#39;');

const layout = (body: string): string => `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Background generator</title>
  <meta name="description" content="Background generator">
</head>
<body>
${body}
</body>
</html>
`;

export const homePage = (): string =>
  layout(`  <h1>Generation of background</h1>
  <form action="/gen" method="get">
    <input type="text" name="id" />
    <input type="submit" value="generate" />
  </form>`);

export type GenPageParams = {
  id: string;
  blurhash: string;
  /** URL de l'image générée */
  genUrl: string;
  /** URL de l'aperçu flou */
  blurUrl: string;
};

export const genPage = ({ id, blurhash, genUrl, blurUrl }: GenPageParams): string =>
  layout(`  <h1>Generation of background for ${escapeHtml(id)}</h1>
  <p>BlurHash is: ${escapeHtml(blurhash)}</p>
  <h2>Generated Image</h2>
  <img src="${escapeHtml(genUrl)}" />
  <h2>Blurhash Image</h2>
  <img src="${escapeHtml(blurUrl)}" />`);

export const errorPage = (message: string): string => layout(`  <h1>Error occurred</h1>
  <p>${escapeHtml(message)}</p>`);
