import { NextResponse } from 'next/server';
import { profileStore } from '@/lib/db';

export async function GET() {
  try {
    const profiles = await profileStore.listProfiles();
    return NextResponse.json({ profiles });
  } catch (error) {
    console.error('Error fetching profiles:', error);
    return NextResponse.json(
      { error: 'Failed to fetch profiles' },
      { status: 500 }
    );
  }
}
