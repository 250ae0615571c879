
const HOURS_IN_MS = 1000 * 60 * 60;
const MINUTES_IN_MS = 1000 * 60;
const SECONDS_IN_MS = 1000;

const BYTE_UNITS = [
  'b',
  'kb',
  'mb',
  'gb',
  'tb',
];

export function getIntuitiveBytes(bytes: number): [ number, string ] {
  let unitIdx: number;
  let sizeVal: number;
  unitIdx = 0;
  sizeVal = bytes;
  while(
    (sizeVal >= 1024)
    && (unitIdx < (BYTE_UNITS.length - 1))
  ) {
    sizeVal = sizeVal / 1024;
    unitIdx++;
  }
  return [
    sizeVal,
    BYTE_UNITS[unitIdx],
  ];
}

export function getIntuitiveByteString(bytes: number, toFixedVal = 3): string {
  let bytesTuple: [ number, string ];
  bytesTuple = getIntuitiveBytes(bytes);
  if(bytesTuple[1] === 'b') {
    return `${bytesTuple[0]} ${bytesTuple[1]}`;
  }
  return `${bytesTuple[0].toFixed(toFixedVal)} ${bytesTuple[1]}`;
}

export function getIntuitiveTime(ms: number): [ number, string ] {
  let timeTuple: [ number, string ];
  if(ms >= HOURS_IN_MS) {
    timeTuple = [
      ms / HOURS_IN_MS,
      'h',
    ];
  } else if(ms >= MINUTES_IN_MS) {
    timeTuple = [
      ms / MINUTES_IN_MS,
      'm',
    ];
  } else if(ms >= SECONDS_IN_MS) {
    timeTuple = [
      ms / SECONDS_IN_MS,
      's',
    ];
  } else if(ms >= 1) {
    timeTuple = [
      ms,
      'ms'
    ];
  } else {
    timeTuple = [
      ms * 1000,
      'µs',
    ];
  }
  return timeTuple;
}

export function getIntuitiveTimeString(ms: number, fixed?: number): string {
  let timeTuple: [ number, string ];
  let fixedPoints: number;
  timeTuple = getIntuitiveTime(ms);
  let includeDecimals = (
    (fixed !== undefined)
    || ((timeTuple[0] % 1) !== 0)
  );
  fixedPoints = fixed ?? 3;
  let timeNum = includeDecimals
    ? timeTuple[0].toFixed(fixedPoints)
    : timeTuple[0]
  ;
  return `${timeNum} ${timeTuple[1]}`;
}

/*
  1234567 -> '1,234,567'
*/
export function getCountString(count: number): string {
  let digits: string;
  let groups: string[];
  digits = `${Math.trunc(Math.abs(count))}`;
  groups = [];
  for(let i = digits.length; i > 0; i -= 3) {
    groups.unshift(digits.substring(Math.max(0, i - 3), i));
  }
  return `${(count < 0) ? '-' : ''}${groups.join(',')}`;
}
