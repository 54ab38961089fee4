const getUserAgent = (): string => {
  if (typeof navigator === "undefined") return "";
  return (navigator.userAgent || "").toLowerCase();
};

export const detectElectron = (): boolean => {
  // Packaged builds report "Electron" in the user agent; the preload script
  // also exposes window.electronAPI.
  const ua = getUserAgent();
  if (typeof window === "undefined") return ua.includes("electron");
  return ua.includes("electron") || Boolean(window.electronAPI);
};
