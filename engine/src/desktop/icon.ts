/**
 * flakedesk Engine — Icon Placeholder
 */

/** Written when neither a bundled nor a downloadable icon is available */
export function placeholderIcon(letter: string): string {
  return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 512 512">
<rect width="512" height="512" rx="115" fill="#D77655"/>
<text x="256" y="320" font-family="Arial,sans-serif" font-size="200" fill="white" text-anchor="middle">${letter}</text>
</svg>
`;
}
