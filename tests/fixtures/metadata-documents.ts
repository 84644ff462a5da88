export function lines(...content: string[]): string {
  return content.join('\n');
}

export const TWO_STATE_DOCUMENT = lines(
  '# BEGIN DMI',
  'version = 4.0',
  '    width = 32',
  '    height = 32',
  'state = "state1"',
  '    dirs = 4',
  '    frames = 2',
  '    delay = 1.2,1',
  'state = "state2"',
  '    dirs = 1',
  '    frames = 1',
  '# END DMI',
);

export const FULL_STATE_DOCUMENT = lines(
  '# BEGIN DMI',
  'version = 4.0',
  '    width = 32',
  '    height = 32',
  'state = "state1"',
  '    dirs = 4',
  '    frames = 2',
  '    delay = 1.2,1',
  '    movement = 1',
  '    loop = 1',
  '    rewind = 0',
  '    hotspot = 12,13,0',
  '    future = "lmao"',
  'state = "state2"',
  '    dirs = 1',
  '    frames = 1',
  '# END DMI',
);
