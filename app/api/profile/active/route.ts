import { NextRequest, NextResponse } from 'next/server';
import { profileStore } from '@/lib/db';
import { ProfileNotFoundError } from '@/lib/errors';
import { activateProfileSchema } from '@/lib/schema';

// POST switch the active profile
export async function POST(request: NextRequest) {
  try {
    const parsed = activateProfileSchema.safeParse(await request.json());
    if (!parsed.success) {
      return NextResponse.json({ error: 'Profile id is required' }, { status: 400 });
    }

    const profile = await profileStore.setActiveProfile(parsed.data.id);
    return NextResponse.json({ success: true, profile });
  } catch (error) {
    if (error instanceof ProfileNotFoundError) {
      return NextResponse.json({ error: error.message }, { status: 404 });
    }
    console.error('Error switching profile:', error);
    return NextResponse.json(
      { error: 'Failed to switch profile' },
      { status: 500 }
    );
  }
}
