/**
 * Publishing finished mockups: Supabase Storage when configured,
 * otherwise a base64 data URL the caller can hand straight to the browser.
 */

/** The slice of the Supabase client this module talks to. */
export interface MockupStorageClient {
  storage: {
    from(bucket: string): {
      upload(
        path: string,
        body: Uint8Array,
        options: { contentType: string; upsert: boolean }
      ): Promise<{ error: { message: string } | null }>;
      getPublicUrl(path: string): { data: { publicUrl: string } };
    };
  };
}

export function toDataUrl(bytes: Uint8Array, contentType: string): string {
  return `data:${contentType};base64,${Buffer.from(bytes).toString('base64')}`;
}

export async function publishMockup(
  client: MockupStorageClient,
  bucket: string,
  outputPath: string,
  bytes: Uint8Array,
  contentType: string
): Promise<string> {
  const { error: uploadError } = await client.storage
    .from(bucket)
    .upload(outputPath, bytes, {
      contentType,
      upsert: true,
    });

  if (uploadError) {
    throw new Error(`Failed to upload mockup: ${uploadError.message}`);
  }

  const { data: publicUrlData } = client.storage
    .from(bucket)
    .getPublicUrl(outputPath);

  console.log('Mockup uploaded:', publicUrlData.publicUrl);
  return publicUrlData.publicUrl;
}
