import { CliColors, ColorFormatter } from '../../service/cli-colors';

const chartreuse_light = CliColors.rgb(190, 255, 125);
const pastel_orange = CliColors.rgb(255, 203, 89);
const gray = CliColors.rgb(104, 104, 104);
const coral = CliColors.rgb(219, 136, 105);
const tomato = CliColors.rgb(255, 101, 71);
const yellow_light = CliColors.rgb(199, 196, 62);
const purple_light = CliColors.rgb(213, 167, 250);
const cyan = CliColors.rgb(142, 250, 253);

const findDupesColorMap = {
  size: yellow_light,
  tree: gray,
  path: purple_light,
  count: pastel_orange,
  bytes: chartreuse_light,
  time: cyan,
  warn: coral,
  error: tomato,
  bold: CliColors.bold,
};

export type FindDupesColors = Record<keyof typeof findDupesColorMap, ColorFormatter>;

export const findDupesColors: FindDupesColors = findDupesColorMap;

const plainColors: FindDupesColors = {
  size: CliColors.plain,
  tree: CliColors.plain,
  path: CliColors.plain,
  count: CliColors.plain,
  bytes: CliColors.plain,
  time: CliColors.plain,
  warn: CliColors.plain,
  error: CliColors.plain,
  bold: CliColors.plain,
};

export function getFindDupesColors(useColor: boolean): FindDupesColors {
  return useColor
    ? findDupesColors
    : plainColors
  ;
}
