import { NextRequest, NextResponse } from 'next/server';
import { profileStore } from '@/lib/db';
import { profileRecordSchema } from '@/lib/schema';

// GET the active profile
export async function GET() {
  try {
    const profile = await profileStore.loadActiveProfile();
    if (!profile) {
      return NextResponse.json({ error: 'No profile found' }, { status: 404 });
    }
    return NextResponse.json({ profile });
  } catch (error) {
    console.error('Error fetching profile:', error);
    return NextResponse.json(
      { error: 'Failed to fetch profile' },
      { status: 500 }
    );
  }
}

// PUT save a profile
export async function PUT(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 });
  }

  const parsed = profileRecordSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      { error: 'Invalid profile', issues: parsed.error.issues },
      { status: 400 }
    );
  }

  try {
    const profile = await profileStore.saveProfile(parsed.data);
    return NextResponse.json({ success: true, profile });
  } catch (error) {
    console.error('Error saving profile:', error);
    return NextResponse.json(
      { error: error instanceof Error ? error.message : 'Failed to save profile' },
      { status: 500 }
    );
  }
}
