export async function timeoutAfter(duration: number): Promise<void> {
  await new Promise<void>(resolve => setTimeout(resolve, duration));
}
