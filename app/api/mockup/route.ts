import { NextRequest, NextResponse } from 'next/server';
import {
  InvalidImageError,
  createAssetLoader,
  createTemplatePalette,
  decodeImage,
  errorMessage,
  isMockupError,
  loadMockupConfig,
  prepareCover,
  publishMockup,
  renderBookMockup,
  toDataUrl,
} from '@/lib/mockup';
import { createServiceRoleClient } from '@/lib/supabase/service-role';

export const runtime = 'nodejs';

interface MockupRequest {
  coverImageBase64?: unknown; // Base64 encoded cover, with or without a data: prefix
  outputPath?: unknown; // Storage path for the finished mockup (optional)
}

const config = loadMockupConfig();
const palette = createTemplatePalette(config.templatesDir);
const assets = createAssetLoader();

function stripDataUrlPrefix(value: string): string {
  const comma = value.indexOf(',');
  return value.startsWith('data:') && comma !== -1 ? value.slice(comma + 1) : value;
}

export async function POST(req: NextRequest) {
  let body: MockupRequest | null;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json(
      { success: false, error: 'Request body must be JSON' },
      { status: 400 }
    );
  }

  const { coverImageBase64, outputPath }: MockupRequest = body ?? {};
  if (typeof coverImageBase64 !== 'string' || coverImageBase64.length === 0) {
    return NextResponse.json(
      { success: false, error: 'coverImageBase64 is required' },
      { status: 400 }
    );
  }

  try {
    console.log('Generating mockup...', { outputPath });

    const bytes = Buffer.from(stripDataUrlPrefix(coverImageBase64), 'base64');
    const cover = prepareCover(await decodeImage(bytes, 'Cover'));

    const rendered = await renderBookMockup(cover, {
      palette,
      maskPath: config.maskPath,
      assets,
    });

    let mockupUrl: string | null = null;

    if (typeof outputPath === 'string' && outputPath) {
      try {
        const supabase = createServiceRoleClient();
        if (supabase) {
          mockupUrl = await publishMockup(
            supabase,
            config.storageBucket,
            outputPath,
            rendered.bytes,
            rendered.contentType
          );
        }
      } catch (storageError) {
        console.error('Storage error, using base64:', storageError);
      }
    }

    return NextResponse.json({
      success: true,
      mockupUrl: mockupUrl ?? toDataUrl(rendered.bytes, rendered.contentType),
      template: rendered.template.name,
      dominantColor: rendered.dominantColor,
    });
  } catch (error) {
    console.error('Mockup generation error:', error);
    const status = error instanceof InvalidImageError ? 400 : 500;
    return NextResponse.json(
      {
        success: false,
        error: errorMessage(error),
        code: isMockupError(error) ? error.code : undefined,
      },
      { status }
    );
  }
}
