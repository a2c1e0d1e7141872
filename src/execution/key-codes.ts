// key-codes.ts - Android key events used for remote-control navigation

export const KeyCode = {
  HOME: 3,
  BACK: 4,
  DPAD_UP: 19,
  DPAD_DOWN: 20,
  DPAD_RIGHT: 22,
  DPAD_CENTER: 23
} as const;

