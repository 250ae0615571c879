
export function sleepImmediate() {
  return new Promise<void>((resolve) => {
    setImmediate(() => {
      resolve();
    });
  });
}
