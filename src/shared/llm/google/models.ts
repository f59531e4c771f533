export const imageModelName = "gemini-2.5-flash-image-preview";
