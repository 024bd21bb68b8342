export type Profile = {
  displayName: string;
  bio: string;
  profileImageUrl: string;
};

export function emptyProfile(displayName = ""): Profile {
  return { displayName, bio: "", profileImageUrl: "" };
}

export function profilesEqual(a: Profile, b: Profile): boolean {
  return (
    a.displayName === b.displayName &&
    a.bio === b.bio &&
    a.profileImageUrl === b.profileImageUrl
  );
}
