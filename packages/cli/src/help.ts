import { DEFAULT_MARGIN, DEFAULT_OUTPUT, DEFAULT_SIZE, listPaperSizes } from '@trimfit/core';

export const VERSION = '0.1.0';

export function usage(): string {
  return `
trimfit: trim whitespace and fit PDF pages to a fixed size with minimum margins

Usage:
  trimfit <input.pdf> [output.pdf] [options]

Arguments:
  input                 Input PDF file
  output                Output PDF file (default: "${DEFAULT_OUTPUT}")

Modes (default: trim, then fit):
  --trim                Trim whitespace only, do not fit to page
  --fit                 Fit to page only, do not trim whitespace

Options:
  --size SIZE           Output page size: WIDTHxHEIGHT in inches or paper name (default: "${DEFAULT_SIZE}")
  --landscape           Landscape orientation (paper names only)
  --portrait            Portrait orientation (paper names only)
  --margin INCHES       Minimum internal margin in inches (default: ${DEFAULT_MARGIN})
  -v, --verbose         Log progress for every page
  -h, --help            Show this message
  --version             Print the version

Paper names:
  ${listPaperSizes().join(', ')}, tabloid

Fitting needs pdfjam on PATH (texlive-extra-utils).
`;
}
