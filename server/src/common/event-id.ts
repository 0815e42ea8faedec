import { customAlphabet } from "nanoid";

export const newEventId = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 16);
